import { readdir, stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import type { RequirementSource } from '../types/manifest.js';

export class NoSourceFoundError extends Error {
  constructor(dir: string) {
    super(
      `No requirements.in or pyproject.toml found in ${dir}. Please specify an input file.`,
    );
    this.name = 'NoSourceFoundError';
  }
}

export class MissingFileError extends Error {
  constructor(public readonly path: string) {
    super(`Not a file: ${path}`);
    this.name = 'MissingFileError';
  }
}

export class InvalidSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSourceError';
  }
}

/** Lookup order when no input file is given. */
export const DEFAULT_SOURCE_FILES = ['requirements.in', 'pyproject.toml'] as const;

export function isManifestPath(path: string): boolean {
  return basename(path).endsWith('.toml');
}

export function determineDefaultFile(listing: readonly string[]): string | null {
  for (const candidate of DEFAULT_SOURCE_FILES) {
    if (listing.includes(candidate)) return candidate;
  }
  return null;
}

export interface SourceRequest {
  file?: string;
  group?: string;
  cwd: string;
}

/**
 * Pick the single requirement source for this run.
 *
 * Throws MissingFileError for an explicit path that is not a file,
 * NoSourceFoundError when discovery finds nothing, and InvalidSourceError
 * when a dependency group is requested from a requirements file.
 */
export async function resolveRequirementSource(
  request: SourceRequest,
): Promise<RequirementSource> {
  let path: string;

  if (request.file !== undefined) {
    path = resolve(request.cwd, request.file);
    if (!(await isFile(path))) {
      throw new MissingFileError(request.file);
    }
  } else {
    const candidates = new Set<string>(DEFAULT_SOURCE_FILES);
    const files: string[] = [];
    for (const name of await readdir(request.cwd)) {
      if (candidates.has(name) && (await isFile(resolve(request.cwd, name)))) files.push(name);
    }
    const found = determineDefaultFile(files);
    if (!found) {
      throw new NoSourceFoundError(request.cwd);
    }
    path = resolve(request.cwd, found);
  }

  if (!isManifestPath(path)) {
    if (request.group !== undefined) {
      throw new InvalidSourceError(
        'You can only specify an optional dependency if your input file is pyproject.toml.',
      );
    }
    return { kind: 'requirements-file', path };
  }

  if (request.group !== undefined) {
    return { kind: 'manifest-group', path, group: request.group };
  }
  return { kind: 'manifest', path };
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}
