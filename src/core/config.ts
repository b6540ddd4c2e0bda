export const DEFAULT_PYTHON = 'python3';
export const DEFAULT_OUTPUT = 'requirements.txt';

export interface CliOptions {
  dependency?: string;
  output?: string;
  python?: string;
  pipArgs?: string;
  hashes?: boolean;
  sync?: boolean;
  dryRun?: boolean;
  yes?: boolean;
}

export interface Settings {
  file?: string;
  group?: string;
  output: string;
  python: string;
  pipArgs: string[];
  hashes: boolean;
  cwd: string;
}

export class OptionConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OptionConflictError';
  }
}

/** Rejects flags that have no effect in the selected mode. */
export function checkOptionCombination(options: CliOptions): void {
  if (options.sync) {
    if (options.hashes) {
      throw new OptionConflictError('--hashes cannot be used with --sync, which writes no lock file.');
    }
    return;
  }
  const syncOnly = [options.dryRun && '--dry-run', options.yes && '--yes'].filter(
    (flag): flag is string => typeof flag === 'string',
  );
  if (syncOnly.length > 0) {
    throw new OptionConflictError(`${syncOnly.join(' and ')} can only be used with --sync.`);
  }
}

export function splitPipArgs(value: string | undefined): string[] {
  if (!value) return [];
  return value.trim().split(/\s+/).filter((arg) => arg.length > 0);
}

/**
 * Resolve run settings. Precedence: CLI option, then environment
 * (ISO_PIN_PYTHON, ISO_PIN_OUTPUT, ISO_PIN_PIP_ARGS), then defaults.
 */
export function resolveSettings(
  file: string | undefined,
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): Settings {
  return {
    file,
    group: options.dependency,
    output: options.output ?? env.ISO_PIN_OUTPUT ?? DEFAULT_OUTPUT,
    python: options.python ?? env.ISO_PIN_PYTHON ?? DEFAULT_PYTHON,
    pipArgs: splitPipArgs(options.pipArgs ?? env.ISO_PIN_PIP_ARGS),
    hashes: options.hashes ?? false,
    cwd,
  };
}
