import { spawnSync } from 'node:child_process';

export interface ProcessResult {
  status: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  /** Variables merged over the current environment. */
  env?: Record<string, string>;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: RunOptions): ProcessResult;
}

export class InterpreterNotFoundError extends Error {
  constructor(
    public readonly command: string,
    public readonly cause?: unknown,
  ) {
    super(`Could not run "${command}". Check the --python option.`);
    this.name = 'InterpreterNotFoundError';
  }
}

const NOT_RUNNABLE = new Set(['ENOENT', 'EACCES']);

function errorCode(err: Error): string | undefined {
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

// pip reports for large dependency sets easily exceed the 1 MiB default.
const MAX_BUFFER = 64 * 1024 * 1024;

/** Runs a command to completion and buffers its output. */
export const spawnRunner: ProcessRunner = {
  run(command, args, options) {
    const result = spawnSync(command, [...args], {
      encoding: 'utf-8',
      env: { ...process.env, ...options?.env },
      maxBuffer: MAX_BUFFER,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    if (result.error) {
      const code = errorCode(result.error);
      if (code !== undefined && NOT_RUNNABLE.has(code)) {
        throw new InterpreterNotFoundError(command, result.error);
      }
      throw result.error;
    }
    return {
      // null status means the child was killed by a signal
      status: result.status ?? 1,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  },
};
