import { MalformedReportError } from './report-interpreter.js';
import type { ProcessRunner } from './process-runner.js';
import type { RequirementSet } from '../types/manifest.js';

export class ResolutionFailedError extends Error {
  constructor(
    public readonly stderr: string,
    public readonly exitCode: number,
  ) {
    const hint = /no such option:\s*--report/.test(stderr)
      ? '\npip >= 22.2 is required. Please update pip and try again.'
      : '';
    super(`Dependency resolution failed (exit code ${exitCode}):\n${stderr.trimEnd()}${hint}`);
    this.name = 'ResolutionFailedError';
  }
}

export interface PipCommand {
  command: string;
  args: string[];
  env: Record<string, string>;
}

/** Always placed after the caller's extra args. */
export const REPORT_FLAGS = ['-q', '--dry-run', '--ignore-installed', '--report', '-'] as const;

export const EXCLUSION_FLAG = '--exclude';

export const RESOLVER_ENV: Record<string, string> = {
  PIP_REQUIRE_VIRTUALENV: 'false',
  PIP_DISABLE_PIP_VERSION_CHECK: '1',
};

export function hasExclusionFlag(pipArgs: readonly string[]): boolean {
  return pipArgs.some(
    (arg) => arg === EXCLUSION_FLAG || arg.startsWith(`${EXCLUSION_FLAG}=`),
  );
}

/**
 * Arguments naming what to resolve.
 *
 * A requirements file is normally passed as `-r <path>`. When the caller
 * excludes packages, the two flags interact unpredictably, so the file's
 * entries are passed directly instead and `-r` is left out.
 */
export function resolverInput(requirements: RequirementSet, pipArgs: readonly string[]): string[] {
  const { source } = requirements;
  if (source.kind !== 'requirements-file') {
    return [...requirements.specifiers];
  }
  if (hasExclusionFlag(pipArgs)) {
    return [...requirements.options, ...requirements.specifiers];
  }
  return ['-r', source.path];
}

export function buildReportCommand(
  python: string,
  requirements: RequirementSet,
  pipArgs: readonly string[] = [],
): PipCommand {
  return {
    command: python,
    args: [
      '-m',
      'pip',
      'install',
      ...pipArgs,
      ...REPORT_FLAGS,
      ...resolverInput(requirements, pipArgs),
    ],
    env: { ...RESOLVER_ENV },
  };
}

/** Run the dry-run resolution and return the parsed, not yet validated, report. */
export function runResolution(command: PipCommand, runner: ProcessRunner): unknown {
  const result = runner.run(command.command, command.args, { env: command.env });
  if (result.status !== 0) {
    throw new ResolutionFailedError(result.stderr, result.status);
  }

  try {
    return JSON.parse(result.stdout);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MalformedReportError(`Resolver output is not valid JSON: ${message}`);
  }
}
