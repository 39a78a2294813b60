import * as fs from 'node:fs';
import * as path from 'node:path';
import { validateBuildEnvironment, formatValidation, hasFailures } from '@prefixbuild/shared';
import type { ValidationCheck } from '@prefixbuild/shared';
import { findProjectRoot } from '../db/connection.js';
import { loadConfig, getFlagValue, positionalArgs } from '../config.js';
import { loadRecipe, defaultRecipe, recipeFeatures } from '../recipe/load.js';
import { resolveRecipesDir } from './build.js';
import * as fmt from '../output/format.js';

/** Find an executable on PATH. */
export function onPath(tool: string, envPath: string = process.env.PATH ?? ''): boolean {
  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    try {
      fs.accessSync(path.join(dir, tool), fs.constants.X_OK);
      return true;
    } catch {
      // not in this directory
    }
  }
  return false;
}

/**
 * A prefix is usable when it is a writable directory, or when its nearest
 * existing ancestor is writable so make install can create it.
 */
export function prefixUsable(prefix: string): boolean {
  let dir = path.resolve(prefix);
  while (!fs.existsSync(dir)) {
    const parent = path.dirname(dir);
    if (parent === dir) return false;
    dir = parent;
  }
  try {
    if (!fs.statSync(dir).isDirectory()) return false;
    fs.accessSync(dir, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/** Any entry under <prefix>/include whose name mentions the feature. */
export function hasFeatureHeaders(prefix: string, feature: string): boolean {
  const includeDir = path.join(prefix, 'include');
  try {
    return fs.readdirSync(includeDir).some(f => f.toLowerCase().includes(feature.toLowerCase()));
  } catch {
    return false;
  }
}

export function collectChecks(args: string[], env: NodeJS.ProcessEnv = process.env): ValidationCheck[] {
  const root = findProjectRoot();
  const config = loadConfig(root);
  const [name, version] = positionalArgs(args, ['--source', '--prefix', '--recipes']);
  const recipe = name && version
    ? loadRecipe(resolveRecipesDir(args, root, config), name, version)
    : defaultRecipe();

  const prefix = getFlagValue(args, '--prefix') ?? env.PREFIX;
  const setPrefix = prefix !== undefined && prefix.trim() !== '' ? prefix : null;
  const sourceDir = path.resolve(getFlagValue(args, '--source') ?? process.cwd());
  const usesAutotools = recipe.phases === undefined;

  const toolsOnPath: Record<string, boolean> = {};
  const tools = usesAutotools
    ? ['autoreconf', 'make']
    : [...new Set(recipe.phases?.map(p => p.command).filter(c => !c.includes('/')) ?? [])];
  for (const tool of tools) toolsOnPath[tool] = onPath(tool, env.PATH);

  const featureHeaders: Record<string, boolean> = {};
  for (const feature of recipeFeatures(recipe)) {
    featureHeaders[feature] = setPrefix !== null && hasFeatureHeaders(setPrefix, feature);
  }

  return validateBuildEnvironment({
    prefix,
    prefixUsable: setPrefix !== null && prefixUsable(setPrefix),
    toolsOnPath,
    hasConfigureAc: !usesAutotools || fs.existsSync(path.join(sourceDir, 'configure.ac')),
    featureHeaders,
    dockerOnPath: onPath('docker', env.PATH),
  });
}

export async function doctor(args: string[]): Promise<void> {
  const checks = collectChecks(args);
  fmt.header('Build environment');
  console.log(formatValidation(checks));
  console.log();
  if (hasFailures(checks)) {
    fmt.error('Some checks failed. A build would not succeed as things stand.');
    process.exitCode = 1;
  } else {
    fmt.success('Ready to build.');
  }
}
