import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as z from 'zod';
import { DEFAULT_CONFIG } from '@prefixbuild/shared';
import { ConfigError, PrefixNotSetError } from './errors.js';
import { formatIssues } from './recipe/schema.js';
import type { PrefixbuildConfig } from './types.js';

const configFileSchema = z.object({
  recipes: z.object({
    dir: z.string().min(1),
  }).partial().optional(),
  build: z.object({
    record_history: z.boolean(),
  }).partial().optional(),
  docker: z.object({
    recipes_dir: z.string().min(1),
    recipes_mount: z.string().min(1),
    artefacts_dir: z.string().min(1),
    artefacts_mount: z.string().min(1),
    build_image: z.string().min(1),
    irods_build_image: z.string().min(1),
    build_channels: z.array(z.string()),
    remove_container: z.boolean(),
  }).partial().optional(),
});

let _cachedConfig: PrefixbuildConfig | null = null;
let _cachedRoot: string | null = null;

function defaults(): PrefixbuildConfig {
  return {
    recipes: { ...DEFAULT_CONFIG.recipes },
    build: { ...DEFAULT_CONFIG.build },
    docker: { ...DEFAULT_CONFIG.docker, build_channels: [...DEFAULT_CONFIG.docker.build_channels] },
  };
}

/**
 * Load .prefixbuild/config.json with full defaults. Cached per project root.
 * A null root (not inside a project) gives the defaults.
 */
export function loadConfig(projectRoot: string | null): PrefixbuildConfig {
  if (!projectRoot) return defaults();
  if (_cachedConfig && _cachedRoot === projectRoot) return _cachedConfig;

  const configPath = path.join(projectRoot, '.prefixbuild', 'config.json');
  if (!fs.existsSync(configPath)) {
    _cachedConfig = defaults();
    _cachedRoot = projectRoot;
    return _cachedConfig;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Invalid JSON in ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config ${configPath}`, formatIssues(parsed.error));
  }

  const loaded = parsed.data;
  const base = defaults();
  _cachedConfig = {
    recipes: { ...base.recipes, ...loaded.recipes },
    build: { ...base.build, ...loaded.build },
    docker: { ...base.docker, ...loaded.docker },
  };
  _cachedRoot = projectRoot;
  return _cachedConfig;
}

/** Clear cached config (for testing). */
export function resetConfigCache(): void {
  _cachedConfig = null;
  _cachedRoot = null;
}

/** Extract a flag's value from args array with bounds checking. */
export function getFlagValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx < 0 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

/**
 * Values of a list flag. Each occurrence takes the arguments after it up
 * to the next flag, so `--x a b --x c` gives [a, b, c].
 */
export function getFlagList(args: string[], ...flags: string[]): string[] {
  const values: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (!flags.includes(args[i])) continue;
    while (i + 1 < args.length && !args[i + 1].startsWith('-')) {
      values.push(args[++i]);
    }
  }
  return values;
}

export function hasFlag(args: string[], ...flags: string[]): boolean {
  return flags.some(f => args.includes(f));
}

/**
 * Positional arguments: everything that is not a flag or a flag's value.
 * `valueFlags` names the flags that consume the next argument.
 */
export function positionalArgs(args: string[], valueFlags: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (valueFlags.includes(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith('--')) continue;
    out.push(arg);
  }
  return out;
}

/** Expand `$HOME`, `${HOME}` and a leading `~`. */
export function expandHome(p: string, home: string = os.homedir()): string {
  let out = p.replace(/\$\{HOME\}|\$HOME/g, home);
  if (out === '~' || out.startsWith('~/')) out = home + out.slice(1);
  return out;
}

/**
 * The installation prefix: --prefix wins over the PREFIX environment variable.
 * Unset, empty or blank is refused with exit code 2.
 */
export function resolvePrefix(args: string[], env: NodeJS.ProcessEnv = process.env): string {
  const value = getFlagValue(args, '--prefix') ?? env.PREFIX;
  if (value === undefined || value.trim() === '') {
    throw new PrefixNotSetError();
  }
  return value;
}
