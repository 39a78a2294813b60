import { findProjectRoot } from '../db/connection.js';
import { loadConfig, getFlagValue, getFlagList, hasFlag, expandHome } from '../config.js';
import { ConfigError } from '../errors.js';
import { parseBatchInput, readStream } from '../batch/input.js';
import { runBatch } from '../batch/runner.js';
import type { BatchSummary } from '../batch/runner.js';
import { nodeRunner } from '../process/run.js';
import type { CommandRunner } from '../process/run.js';
import { openRecorder } from '../history/recorder.js';
import type { BatchOptions, PrefixbuildConfig } from '../types.js';

function parseId(value: string | undefined, flag: string, fallback: number): number {
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new ConfigError(`${flag} must be a non-negative integer, got "${value}"`);
  }
  return n;
}

/**
 * Merge flags over config. Flags win; directory settings get $HOME expanded.
 */
export function batchOptions(args: string[], config: PrefixbuildConfig): BatchOptions {
  const d = config.docker;
  const channels = getFlagList(args, '--build-channel', '--build-channels');
  return {
    recipesDir: expandHome(getFlagValue(args, '--recipes-dir') ?? d.recipes_dir),
    recipesMount: getFlagValue(args, '--recipes-mount') ?? d.recipes_mount,
    artefactsDir: expandHome(getFlagValue(args, '--artefacts-dir') ?? d.artefacts_dir),
    artefactsMount: getFlagValue(args, '--artefacts-mount') ?? d.artefacts_mount,
    buildChannels: channels.length > 0 ? channels : d.build_channels,
    irodsBuildImage: getFlagValue(args, '--irods-build-image') ?? d.irods_build_image,
    condaBuildImage: getFlagValue(args, '--conda-build-image') ?? d.build_image,
    removeContainer: hasFlag(args, '--remove-container') || d.remove_container,
    condaUid: parseId(getFlagValue(args, '--conda-uid'), '--conda-uid', process.getuid?.() ?? 0),
    condaGid: parseId(getFlagValue(args, '--conda-gid'), '--conda-gid', process.getgid?.() ?? 0),
    dryRun: hasFlag(args, '--dry-run'),
  };
}

export async function batch(
  args: string[],
  input: NodeJS.ReadableStream = process.stdin,
  runner: CommandRunner = nodeRunner,
): Promise<BatchSummary> {
  const root = findProjectRoot();
  const config = loadConfig(root);
  const options = batchOptions(args, config);
  const entries = parseBatchInput(await readStream(input));

  const recorder = openRecorder(root, !options.dryRun && config.build.record_history);

  const summary = await runBatch(entries, options, runner, recorder);
  process.exitCode = summary.exitCode;
  return summary;
}
