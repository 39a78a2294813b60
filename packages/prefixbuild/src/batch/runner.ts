import type { CommandRunner } from '../process/run.js';
import { formatCommandLine } from '../recipe/template.js';
import { PrefixbuildError } from '../errors.js';
import { nullRecorder } from '../history/recorder.js';
import type { RunRecorder } from '../history/recorder.js';
import { isShutdownRequested, EXIT_INTERRUPTED } from '../shutdown.js';
import { selectImage, dockerRunCommand, dockerPullCommand } from './docker.js';
import type { BatchEntry, BatchOptions, BatchPackageResult } from '../types.js';
import * as fmt from '../output/format.js';

const BEGIN_BANNER = '########## BEGIN process STDOUT/STDERR ##########';
const END_BANNER = '########## END process STDOUT/STDERR ##########';

export interface BatchSummary {
  results: BatchPackageResult[];
  failed: number;
  exitCode: number;
}

async function pull(runner: CommandRunner, image: string): Promise<void> {
  const [command, ...args] = dockerPullCommand(image);
  fmt.debug(`Pulling ${image}`);
  const { exitCode, output } = await runner.capture(command, args);
  if (exitCode !== 0) {
    throw new PrefixbuildError(`docker pull ${image} failed with exit code ${exitCode}\n${output.trimEnd()}`);
  }
}

function logOutput(output: string, log: (msg: string) => void): void {
  log(BEGIN_BANNER);
  for (const line of output.split('\n')) {
    log(line);
  }
  log(END_BANNER);
}

/**
 * Build each entry with conda in Docker, in input order. A failed package
 * is logged and the batch moves on; the summary exit code is 1 if any failed,
 * or 130 if an interrupt skipped the remaining packages.
 */
export async function runBatch(
  entries: BatchEntry[],
  options: BatchOptions,
  runner: CommandRunner,
  recorder: RunRecorder = nullRecorder,
): Promise<BatchSummary> {
  const results: BatchPackageResult[] = [];
  let failed = 0;
  let interrupted = false;

  if (!options.dryRun) {
    await pull(runner, options.condaBuildImage);
  }

  for (const entry of entries) {
    if (isShutdownRequested()) {
      fmt.warn('Shutdown requested. Skipping remaining packages.');
      interrupted = true;
      break;
    }

    fmt.info(`Working on ${entry.name} ${entry.version} ${entry.path}`);

    const image = selectImage(entry, options);
    if (image !== options.condaBuildImage) {
      fmt.info(`Using image ${image}`);
      if (!options.dryRun) await pull(runner, image);
    }

    const cmd = dockerRunCommand(entry, image, options);

    if (options.dryRun) {
      fmt.info(`Docker command: "${formatCommandLine(cmd[0], cmd.slice(1))}"`);
      results.push({ entry, image, exitCode: null });
      continue;
    }

    fmt.debug(`Build script: "${cmd[cmd.length - 1]}"`);

    const runId = recorder.start('docker', entry.name, entry.version, null, entry.path);
    const started = Date.now();
    const { exitCode, output } = await runner.capture(cmd[0], cmd.slice(1));
    recorder.phase(runId, 1, {
      name: 'conda-build',
      commandLine: formatCommandLine(cmd[0], cmd.slice(1)),
      exitCode,
      durationMs: Date.now() - started,
    });
    recorder.finish(runId, exitCode);

    if (exitCode === 0) {
      logOutput(output, fmt.debug);
    } else {
      failed++;
      logOutput(output, fmt.error);
    }
    results.push({ entry, image, exitCode });
  }

  if (interrupted) return { results, failed, exitCode: EXIT_INTERRUPTED };
  return { results, failed, exitCode: failed > 0 ? 1 : 0 };
}
