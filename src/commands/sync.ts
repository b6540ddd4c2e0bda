import ora from 'ora';
import chalk from 'chalk';
import { resolveSettings } from '../core/config.js';
import { spawnRunner } from '../core/process-runner.js';
import {
  applySyncPlan,
  computeSyncPlan,
  readInstalledPackages,
  type SyncOutcome,
} from '../core/sync-reconciler.js';
import { displaySyncPlan } from '../utils/plan-display.js';
import { icons, label } from '../utils/output.js';
import { resolveWithProgress, type LockOptions } from './lock.js';

export type SyncOptions = LockOptions;

export async function sync(file: string | undefined, options: SyncOptions = {}): Promise<void> {
  const settings = resolveSettings(file, options, options.env, options.cwd);
  const runner = options.runner ?? spawnRunner;

  const { graph } = await resolveWithProgress(settings, runner);
  const installed = readInstalledPackages(settings.python, runner);
  const plan = computeSyncPlan(graph, installed);

  displaySyncPlan(plan, settings.python);

  if (plan.isEmpty) {
    console.log(`${icons.success} ${chalk.green('Environment already matches the resolved requirements.')}`);
    return;
  }

  if (options.dryRun) {
    console.log(label('Dry run — no changes applied.'));
    return;
  }

  if (!options.yes) {
    console.log('');
    const { confirm } = await import('@inquirer/prompts');
    const ok = await confirm({ message: `Apply these changes to ${settings.python}?` });
    if (!ok) {
      console.log('Aborted.');
      return;
    }
  }

  const spinner = ora('Syncing environment...').start();
  let outcome: SyncOutcome;
  try {
    outcome = applySyncPlan(plan, settings.python, runner);
  } catch (err) {
    spinner.fail('Sync failed');
    throw err;
  }
  spinner.succeed(
    `Removed ${outcome.removed.length}, installed ${outcome.installed.length} packages`,
  );
}
