import { resolveRequirementSource } from './input-resolver.js';
import { loadRequirements } from './manifest-loader.js';
import { buildReportCommand, runResolution } from './resolution-invoker.js';
import { interpretReport } from './report-interpreter.js';
import { requirementName } from '../utils/identifiers.js';
import type { ProcessRunner } from './process-runner.js';
import type { Settings } from './config.js';
import type { DependencyGraph } from '../types/lockfile.js';
import type { RequirementSet } from '../types/manifest.js';

export class NothingToPinError extends Error {
  constructor() {
    super('There are no requirements to pin.');
    this.name = 'NothingToPinError';
  }
}

export interface Resolution {
  requirements: RequirementSet;
  graph: DependencyGraph;
}

export async function resolveDependencyGraph(
  settings: Settings,
  runner: ProcessRunner,
): Promise<Resolution> {
  const source = await resolveRequirementSource({
    file: settings.file,
    group: settings.group,
    cwd: settings.cwd,
  });
  const requirements = await loadRequirements(source);
  if (requirements.specifiers.length === 0 && requirements.options.length === 0) {
    throw new NothingToPinError();
  }

  const command = buildReportCommand(settings.python, requirements, settings.pipArgs);
  const report = runResolution(command, runner);

  const requestedNames = requirements.specifiers
    .map(requirementName)
    .filter((name): name is string => name !== null);
  const graph = interpretReport(report, requestedNames);
  if (graph.topLevel.length === 0 && graph.dependencies.length === 0) {
    throw new NothingToPinError();
  }

  return { requirements, graph };
}
