import { resolve } from 'node:path';
import ora from 'ora';
import chalk from 'chalk';
import { resolveSettings, type CliOptions, type Settings } from '../core/config.js';
import { resolveDependencyGraph, type Resolution } from '../core/resolve-graph.js';
import { renderLockFile, writeLockFile } from '../core/lock-renderer.js';
import { spawnRunner, type ProcessRunner } from '../core/process-runner.js';
import { allPackages } from '../types/lockfile.js';
import { icons } from '../utils/output.js';

export interface LockOptions extends CliOptions {
  runner?: ProcessRunner;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export async function resolveWithProgress(
  settings: Settings,
  runner: ProcessRunner,
): Promise<Resolution> {
  const spinner = ora('Resolving dependencies...').start();
  let resolution: Resolution;
  try {
    resolution = await resolveDependencyGraph(settings, runner);
  } catch (err) {
    spinner.fail('Dependency resolution failed');
    throw err;
  }
  spinner.succeed('Dependencies resolved');
  return resolution;
}

export async function lock(file: string | undefined, options: LockOptions = {}): Promise<void> {
  const settings = resolveSettings(file, options, options.env, options.cwd);
  const { graph } = await resolveWithProgress(settings, options.runner ?? spawnRunner);

  const content = renderLockFile(graph, { hashes: settings.hashes });
  await writeLockFile(resolve(settings.cwd, settings.output), content);

  if (settings.hashes) {
    const unhashed = allPackages(graph).filter((p) => !p.hash);
    if (unhashed.length > 0) {
      console.warn(
        `${icons.warning} No hash reported for: ${unhashed.map((p) => p.name).join(', ')}`,
      );
    }
  }

  const count = graph.topLevel.length + graph.dependencies.length;
  console.log(
    `${icons.success} ${chalk.green(`Pinned ${count} requirements in ${settings.output}`)}`,
  );
}
