import type { ErrorObject } from 'ajv';
import { formatSchemaError, getReportValidator } from './schema-validator.js';
import { compareNames, normalizeName } from '../utils/identifiers.js';
import type { DependencyGraph, ResolvedPackage } from '../types/lockfile.js';
import type { PipReportEntry } from '../types/pip.js';

export class MalformedReportError extends Error {
  constructor(
    message: string,
    public readonly entry?: string,
  ) {
    super(message);
    this.name = 'MalformedReportError';
  }
}

const ENTRY_PATH = /^\/install\/(\d+)(?:\/|$)/;

function entryLabel(report: unknown, index: number): string {
  const label = `install[${index}]`;
  if (typeof report !== 'object' || report === null || !('install' in report)) return label;
  const install = report.install;
  if (!Array.isArray(install)) return label;

  const entry: unknown = install[index];
  if (typeof entry !== 'object' || entry === null || !('metadata' in entry)) return label;
  const metadata = entry.metadata;
  if (typeof metadata !== 'object' || metadata === null || !('name' in metadata)) return label;
  return typeof metadata.name === 'string' ? `${label} (${metadata.name})` : label;
}

function toMalformedError(report: unknown, errors: ErrorObject[]): MalformedReportError {
  let first: { index: number; error: ErrorObject } | undefined;
  for (const error of errors) {
    const match = ENTRY_PATH.exec(error.instancePath);
    if (!match) continue;
    const index = parseInt(match[1], 10);
    if (!first || index < first.index) first = { index, error };
  }

  if (first) {
    const label = entryLabel(report, first.index);
    return new MalformedReportError(
      `Malformed entry ${label} in resolver report: ${formatSchemaError(first.error)}`,
      label,
    );
  }

  const detail = errors.length > 0 ? formatSchemaError(errors[0]) : 'unknown error';
  return new MalformedReportError(`Malformed resolver report: ${detail}`);
}

/**
 * The artifact hash as `<algorithm>:<digest>`. pip reports the newer
 * `hashes` map and the legacy `hash` string (`sha256=<digest>`).
 */
export function extractHash(entry: PipReportEntry): string | undefined {
  const archive = entry.download_info?.archive_info;
  if (!archive) return undefined;

  const sha256 = archive.hashes?.sha256;
  if (sha256) return `sha256:${sha256}`;

  if (archive.hash) {
    const sep = archive.hash.indexOf('=');
    if (sep > 0) {
      return `${archive.hash.slice(0, sep)}:${archive.hash.slice(sep + 1)}`;
    }
  }
  return undefined;
}

/**
 * Turn a pip installation report into a DependencyGraph.
 *
 * `requestedNames` are the distribution names of the top-level specifiers in
 * input order. Entries are deduplicated by normalized name with the later
 * entry winning.
 */
export function interpretReport(
  report: unknown,
  requestedNames: readonly string[],
): DependencyGraph {
  const validate = getReportValidator();
  if (!validate(report)) {
    throw toMalformedError(report, validate.errors ?? []);
  }

  const rank = new Map<string, number>();
  requestedNames.forEach((name, i) => {
    const key = normalizeName(name);
    if (!rank.has(key)) rank.set(key, i);
  });

  const byName = new Map<string, ResolvedPackage>();
  for (const entry of report.install) {
    const key = normalizeName(entry.metadata.name);
    const pkg: ResolvedPackage = {
      name: entry.metadata.name,
      version: entry.metadata.version,
      topLevel: entry.requested || rank.has(key),
    };
    const hash = extractHash(entry);
    if (hash) pkg.hash = hash;

    byName.delete(key);
    byName.set(key, pkg);
  }

  const packages = [...byName.values()];
  const unlisted = requestedNames.length;
  const rankOf = (pkg: ResolvedPackage) => rank.get(normalizeName(pkg.name)) ?? unlisted;

  return {
    topLevel: packages.filter((p) => p.topLevel).sort((a, b) => rankOf(a) - rankOf(b)),
    dependencies: packages.filter((p) => !p.topLevel).sort((a, b) => compareNames(a.name, b.name)),
  };
}
