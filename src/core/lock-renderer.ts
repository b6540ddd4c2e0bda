import { writeFile } from 'node:fs/promises';
import type { DependencyGraph, ResolvedPackage } from '../types/lockfile.js';

export const TOP_LEVEL_HEADER = '# Top level requirements';
export const DEPENDENCIES_HEADER = '# Dependencies of top level requirements';

export interface RenderOptions {
  hashes?: boolean;
}

function pinnedLines(pkg: ResolvedPackage, hashes: boolean): string[] {
  const pin = `${pkg.name}==${pkg.version}`;
  if (hashes && pkg.hash) {
    return [`${pin} \\`, `    --hash=${pkg.hash}`];
  }
  return [pin];
}

/**
 * Render the graph as a pinned requirements file. Output depends only on the
 * graph and options so repeated runs diff cleanly.
 */
export function renderLockFile(graph: DependencyGraph, options: RenderOptions = {}): string {
  const hashes = options.hashes ?? false;
  const lines = [
    TOP_LEVEL_HEADER,
    ...graph.topLevel.flatMap((pkg) => pinnedLines(pkg, hashes)),
    DEPENDENCIES_HEADER,
    ...graph.dependencies.flatMap((pkg) => pinnedLines(pkg, hashes)),
  ];
  return lines.map((line) => `${line}\n`).join('');
}

export async function writeLockFile(outputPath: string, content: string): Promise<void> {
  await writeFile(outputPath, content, 'utf-8');
}
