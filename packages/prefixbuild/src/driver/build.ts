import { formatCommandLine } from '../recipe/template.js';
import type { CommandRunner } from '../process/run.js';
import { isShutdownRequested, EXIT_INTERRUPTED } from '../shutdown.js';
import type { BuildResult, Phase, PhaseResult } from '../types.js';
import * as fmt from '../output/format.js';

export interface BuildOptions {
  recipe: string;
  version: string;
  prefix: string;
  phases: Phase[];
  /** Source tree; every phase runs here. */
  sourceDir: string;
  runner: CommandRunner;
  env?: NodeJS.ProcessEnv;
  dryRun?: boolean;
  /** Called after each phase that ran, success or not. */
  onPhase?: (result: PhaseResult, seq: number) => void;
}

/**
 * Run the phases in order. The first non-zero exit stops the run and
 * becomes the run's exit code; later phases never start.
 */
export async function runBuild(options: BuildOptions): Promise<BuildResult> {
  const { recipe, version, prefix, phases, sourceDir, runner } = options;
  const env = { ...(options.env ?? process.env), PREFIX: prefix };
  const result: BuildResult = {
    recipe,
    version,
    prefix,
    exitCode: 0,
    failedPhase: null,
    phases: [],
  };

  for (const [i, phase] of phases.entries()) {
    const commandLine = formatCommandLine(phase.command, phase.args);
    const label = `[${i + 1}/${phases.length}] ${phase.name}`;

    if (options.dryRun) {
      fmt.info(`${label}: ${commandLine}`);
      continue;
    }

    if (isShutdownRequested()) {
      fmt.warn(`Interrupted before ${phase.name}.`);
      result.exitCode = EXIT_INTERRUPTED;
      result.failedPhase = phase.name;
      return result;
    }

    fmt.info(`${label}: ${commandLine}`);
    const started = Date.now();
    const exitCode = await runner.run(phase.command, phase.args, { cwd: sourceDir, env });
    const phaseResult: PhaseResult = {
      name: phase.name,
      commandLine,
      exitCode,
      durationMs: Date.now() - started,
    };
    result.phases.push(phaseResult);
    options.onPhase?.(phaseResult, i + 1);

    if (exitCode !== 0) {
      fmt.error(`${phase.name} failed with exit code ${exitCode}`);
      result.exitCode = exitCode;
      result.failedPhase = phase.name;
      return result;
    }
    fmt.debug(`${phase.name} finished in ${phaseResult.durationMs}ms`);
  }

  return result;
}
