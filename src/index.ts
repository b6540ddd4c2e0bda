#!/usr/bin/env node

import { Command } from 'commander';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { lock } from './commands/lock.js';
import { sync } from './commands/sync.js';
import {
  checkOptionCombination,
  DEFAULT_OUTPUT,
  DEFAULT_PYTHON,
  type CliOptions,
} from './core/config.js';
import { VERSION } from './version.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('iso-pin')
    .description(
      "Use pip install --report to pin requirements without touching the active environment",
    )
    .version(VERSION)
    .argument(
      '[file]',
      'Path to a requirements file or pyproject.toml. ' +
        "Defaults to 'requirements.in' or 'pyproject.toml' in the current directory.",
    )
    .option('-d, --dependency <group>', 'Optional dependency group from pyproject.toml to include')
    .option('-o, --output <path>', `Output file (default: ${DEFAULT_OUTPUT})`)
    .option('-p, --python <path>', `Python interpreter to use (default: ${DEFAULT_PYTHON})`)
    .option('--pip-args <args>', 'Extra arguments for pip install, e.g. "--pre --index-url URL"')
    .option('--hashes', 'Add hashes to the output file')
    .option('-s, --sync', 'Make the interpreter\'s installed packages match the resolved set')
    .option('--dry-run', 'With --sync: show the plan without applying it')
    .option('--yes', 'With --sync: skip confirmation')
    .action(async (file: string | undefined, options: CliOptions) => {
      try {
        checkOptionCombination(options);
        if (options.sync) {
          await sync(file, options);
        } else {
          await lock(file, options);
        }
      } catch (err) {
        console.error(err instanceof Error ? err.message : err);
        process.exit(1);
      }
    });

  return program;
}

// Only parse when run as CLI entry point (ESM check with symlink resolution)
const selfUrl = import.meta.url;
let isDirectRun = false;
try {
  if (process.argv[1]) {
    isDirectRun = selfUrl === pathToFileURL(realpathSync(process.argv[1])).href;
  }
} catch {
  isDirectRun = false;
}
if (isDirectRun) {
  await buildProgram().parseAsync();
}
