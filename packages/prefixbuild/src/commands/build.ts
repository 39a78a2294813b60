import * as fs from 'node:fs';
import * as path from 'node:path';
import { findProjectRoot } from '../db/connection.js';
import { loadConfig, getFlagValue, hasFlag, positionalArgs, resolvePrefix } from '../config.js';
import { loadRecipe, defaultRecipe, expandRecipe } from '../recipe/load.js';
import { ConfigError, RecipeError } from '../errors.js';
import { runBuild } from '../driver/build.js';
import { nodeRunner } from '../process/run.js';
import type { CommandRunner } from '../process/run.js';
import { openRecorder } from '../history/recorder.js';
import type { RunRecorder } from '../history/recorder.js';
import type { BuildResult, PrefixbuildConfig } from '../types.js';
import * as fmt from '../output/format.js';

const VALUE_FLAGS = ['--source', '--prefix', '--recipes'];

export function resolveRecipesDir(args: string[], root: string | null, config: PrefixbuildConfig): string {
  const flag = getFlagValue(args, '--recipes');
  if (flag) return path.resolve(flag);
  return path.resolve(root ?? process.cwd(), config.recipes.dir);
}

export async function build(args: string[], runner: CommandRunner = nodeRunner): Promise<BuildResult> {
  const prefix = resolvePrefix(args);
  const root = findProjectRoot();
  const config = loadConfig(root);
  const dryRun = hasFlag(args, '--dry-run');

  const [name, version] = positionalArgs(args, VALUE_FLAGS);
  if (name && !version) {
    throw new RecipeError('Usage: prefixbuild build [<name> <version>]');
  }
  const recipe = name
    ? loadRecipe(resolveRecipesDir(args, root, config), name, version)
    : defaultRecipe();
  const phases = expandRecipe(recipe, prefix);
  const sourceDir = path.resolve(getFlagValue(args, '--source') ?? process.cwd());
  if (!fs.existsSync(sourceDir) || !fs.statSync(sourceDir).isDirectory()) {
    throw new ConfigError(`Source directory ${sourceDir} does not exist`);
  }

  fmt.header(`${dryRun ? 'Dry run' : 'Building'} ${recipe.name} ${recipe.version}`);
  fmt.info(`Prefix: ${prefix}`);
  fmt.info(`Source: ${sourceDir}`);

  const recorder = pickRecorder(args, root, config, dryRun);
  const runId = recorder.start('local', recipe.name, recipe.version, prefix, sourceDir);

  const result = await runBuild({
    recipe: recipe.name,
    version: recipe.version,
    prefix,
    phases,
    sourceDir,
    runner,
    dryRun,
    onPhase: (phase, seq) => recorder.phase(runId, seq, phase),
  });

  recorder.finish(runId, result.exitCode);

  if (result.exitCode === 0) {
    if (!dryRun) fmt.success(`Installed ${recipe.name} ${recipe.version} into ${prefix}`);
  } else {
    fmt.error(`Build of ${recipe.name} ${recipe.version} stopped at ${result.failedPhase} (exit ${result.exitCode})`);
  }
  process.exitCode = result.exitCode;
  return result;
}

function pickRecorder(args: string[], root: string | null, config: PrefixbuildConfig, dryRun: boolean): RunRecorder {
  const enabled = !dryRun && !hasFlag(args, '--no-record') && config.build.record_history;
  return openRecorder(root, enabled);
}
