import { MalformedReportError } from './report-interpreter.js';
import { formatSchemaError, getListValidator } from './schema-validator.js';
import { normalizeName } from '../utils/identifiers.js';
import { allPackages } from '../types/lockfile.js';
import type { ProcessRunner } from './process-runner.js';
import type { DependencyGraph, InstalledPackage, ResolvedPackage } from '../types/lockfile.js';

export class PipListError extends Error {
  constructor(public readonly stderr: string) {
    super(`Could not list installed packages:\n${stderr.trimEnd()}`);
    this.name = 'PipListError';
  }
}

export class SyncRemovalError extends Error {
  constructor(
    public readonly packages: string[],
    public readonly stderr: string,
  ) {
    super(`Failed to remove ${packages.join(', ')}:\n${stderr.trimEnd()}`);
    this.name = 'SyncRemovalError';
  }
}

export class SyncInstallError extends Error {
  constructor(
    public readonly specifiers: string[],
    public readonly removed: string[],
    public readonly stderr: string,
  ) {
    const removedNote = removed.length > 0
      ? `\nAlready removed (not restored): ${removed.join(', ')}`
      : '';
    super(`Failed to install ${specifiers.join(' ')}:\n${stderr.trimEnd()}${removedNote}`);
    this.name = 'SyncInstallError';
  }
}

/** Never removed by sync, even when absent from the resolved set. */
export const PROTECTED_PACKAGES = ['pip', 'setuptools'];

export interface UpgradeAction {
  package: ResolvedPackage;
  installedVersion: string;
}

export interface SyncPlan {
  remove: InstalledPackage[];
  install: ResolvedPackage[];
  upgrade: UpgradeAction[];
  /** Editable installs, left alone whatever the graph says. */
  preserved: InstalledPackage[];
  isEmpty: boolean;
}

export function readInstalledPackages(python: string, runner: ProcessRunner): InstalledPackage[] {
  const result = runner.run(python, ['-m', 'pip', 'list', '--format', 'json'], {
    env: { PIP_DISABLE_PIP_VERSION_CHECK: '1' },
  });
  if (result.status !== 0) {
    throw new PipListError(result.stderr);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(result.stdout);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MalformedReportError(`pip list output is not valid JSON: ${message}`);
  }

  const validate = getListValidator();
  if (!validate(parsed)) {
    const first = validate.errors?.[0];
    throw new MalformedReportError(
      `Malformed pip list output: ${first ? formatSchemaError(first) : 'unknown error'}`,
    );
  }

  return parsed.map((entry) => ({
    name: entry.name,
    version: entry.version,
    editable: entry.editable_project_location !== undefined,
  }));
}

export function computeSyncPlan(
  graph: DependencyGraph,
  installed: readonly InstalledPackage[],
): SyncPlan {
  const remove: InstalledPackage[] = [];
  const install: ResolvedPackage[] = [];
  const upgrade: UpgradeAction[] = [];
  const preserved: InstalledPackage[] = [];

  const wanted = new Map(allPackages(graph).map((p) => [normalizeName(p.name), p]));
  const present = new Map<string, InstalledPackage>();
  const protectedNames = new Set(PROTECTED_PACKAGES.map(normalizeName));

  for (const pkg of installed) {
    const key = normalizeName(pkg.name);
    present.set(key, pkg);

    if (pkg.editable) {
      preserved.push(pkg);
    } else if (!wanted.has(key) && !protectedNames.has(key)) {
      remove.push(pkg);
    }
  }

  for (const [key, pkg] of wanted) {
    const current = present.get(key);
    if (!current) {
      install.push(pkg);
    } else if (!current.editable && current.version !== pkg.version) {
      upgrade.push({ package: pkg, installedVersion: current.version });
    }
  }

  return {
    remove,
    install,
    upgrade,
    preserved,
    isEmpty: remove.length === 0 && install.length === 0 && upgrade.length === 0,
  };
}

export function installSpecifiers(plan: SyncPlan): string[] {
  return [...plan.install, ...plan.upgrade.map((u) => u.package)].map(
    (p) => `${p.name}==${p.version}`,
  );
}

export interface SyncOutcome {
  removed: string[];
  installed: string[];
}

/**
 * Removals run first and abort the sync on failure. Installs and upgrades go
 * through a single pip invocation; if it fails, removals are not undone.
 */
export function applySyncPlan(
  plan: SyncPlan,
  python: string,
  runner: ProcessRunner,
): SyncOutcome {
  const removed = plan.remove.map((p) => p.name);
  if (removed.length > 0) {
    const result = runner.run(python, ['-m', 'pip', 'uninstall', '-y', ...removed]);
    if (result.status !== 0) {
      throw new SyncRemovalError(removed, result.stderr);
    }
  }

  const specifiers = installSpecifiers(plan);
  if (specifiers.length > 0) {
    const result = runner.run(python, ['-m', 'pip', 'install', ...specifiers]);
    if (result.status !== 0) {
      throw new SyncInstallError(specifiers, removed, result.stderr);
    }
  }

  return { removed, installed: specifiers };
}
