import { readFile } from 'node:fs/promises';
import TOML from '@iarna/toml';
import { InvalidSourceError } from './input-resolver.js';
import { readRequirementsFile } from './requirements-file.js';
import type { RequirementSet, RequirementSource } from '../types/manifest.js';

export class ManifestLoadError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'ManifestLoadError';
  }
}

type TomlTable = Record<string, unknown>;

function isTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function loadManifest(manifestPath: string): Promise<TomlTable> {
  let raw: string;
  try {
    raw = await readFile(manifestPath, 'utf-8');
  } catch (err) {
    throw new ManifestLoadError(`Cannot read ${manifestPath}`, err);
  }

  try {
    return TOML.parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ManifestLoadError(`Invalid TOML in ${manifestPath}: ${message}`, err);
  }
}

function toSpecifierList(value: unknown, where: string): string[] {
  if (value === undefined) return [];
  if (!Array.isArray(value) || !value.every((v) => typeof v === 'string')) {
    throw new ManifestLoadError(`${where} must be a list of strings.`);
  }
  return [...value];
}

/**
 * Base dependencies from `[project]`, followed by those of the optional
 * dependency group when one is given.
 */
export function readManifestDependencies(manifest: TomlTable, group?: string): string[] {
  const project = manifest.project;
  if (!isTable(project)) {
    throw new ManifestLoadError("TOML file does not contain a 'project' section.");
  }

  const dependencies = toSpecifierList(project.dependencies, 'project.dependencies');
  if (group === undefined) return dependencies;

  const optional = project['optional-dependencies'];
  if (!isTable(optional)) {
    throw new InvalidSourceError('No optional dependencies defined in TOML file.');
  }
  if (!(group in optional)) {
    throw new InvalidSourceError(`No optional dependency '${group}' found in TOML file.`);
  }

  return [
    ...dependencies,
    ...toSpecifierList(optional[group], `project.optional-dependencies.${group}`),
  ];
}

export async function loadRequirements(source: RequirementSource): Promise<RequirementSet> {
  switch (source.kind) {
    case 'requirements-file': {
      const { specifiers, options } = await readRequirementsFile(source.path);
      return { source, specifiers, options };
    }
    case 'manifest':
      return {
        source,
        specifiers: readManifestDependencies(await loadManifest(source.path)),
        options: [],
      };
    case 'manifest-group':
      return {
        source,
        specifiers: readManifestDependencies(await loadManifest(source.path), source.group),
        options: [],
      };
  }
}
