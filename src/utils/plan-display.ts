import chalk from 'chalk';
import { header, label, table } from './output.js';
import type { SyncPlan } from '../core/sync-reconciler.js';

export function displaySyncPlan(plan: SyncPlan, python: string): void {
  console.log('');
  console.log(header(`Sync Plan: ${python}`));
  console.log('');

  const rows: string[][] = [];
  for (const pkg of plan.remove) {
    rows.push([`  ${chalk.red('-')}`, pkg.name, pkg.version, '(remove)']);
  }
  for (const pkg of plan.install) {
    rows.push([`  ${chalk.green('+')}`, pkg.name, pkg.version, '(install)']);
  }
  for (const { package: pkg, installedVersion } of plan.upgrade) {
    rows.push([
      `  ${chalk.yellow('~')}`,
      pkg.name,
      `${installedVersion} → ${pkg.version}`,
      '(change version)',
    ]);
  }
  for (const pkg of plan.preserved) {
    rows.push([`  ${chalk.dim('=')}`, pkg.name, pkg.version, '(editable, kept)']);
  }

  if (rows.length > 0) {
    console.log(table(rows));
  }

  console.log('');
  console.log(
    label(
      `${plan.remove.length} to remove, ${plan.install.length} to install, ` +
        `${plan.upgrade.length} to change version`,
    ),
  );
}
