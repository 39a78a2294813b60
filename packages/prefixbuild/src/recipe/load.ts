import * as fs from 'node:fs';
import * as path from 'node:path';
import { autotoolsPhases, DEFAULT_RECIPE } from '@prefixbuild/shared';
import { RecipeError } from '../errors.js';
import { recipeSchema, formatIssues } from './schema.js';
import type { Recipe } from './schema.js';
import { expandTemplate } from './template.js';
import type { Phase } from '../types.js';

export const RECIPE_FILE = 'recipe.json';

export function recipePath(recipesDir: string, name: string, version: string): string {
  return path.join(recipesDir, name, version, RECIPE_FILE);
}

/**
 * Parse and validate recipe JSON. `where` names the source in errors.
 */
export function parseRecipe(json: string, where: string): Recipe {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new RecipeError(`Invalid JSON in ${where}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const parsed = recipeSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RecipeError(`Invalid recipe ${where}`, formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Load <recipesDir>/<name>/<version>/recipe.json.
 * The recipe's own name and version must match its location.
 */
export function loadRecipe(recipesDir: string, name: string, version: string): Recipe {
  const file = recipePath(recipesDir, name, version);
  if (!fs.existsSync(file)) {
    throw new RecipeError(`No recipe for ${name} ${version} (looked in ${file})`);
  }
  const recipe = parseRecipe(fs.readFileSync(file, 'utf-8'), file);
  if (recipe.name !== name || recipe.version !== version) {
    throw new RecipeError(
      `Recipe ${file} declares ${recipe.name} ${recipe.version}, expected ${name} ${version}`,
    );
  }
  return recipe;
}

/** The built-in tears recipe, used when no name is given. */
export function defaultRecipe(): Recipe {
  return recipeSchema.parse(DEFAULT_RECIPE);
}

export interface RecipeListing {
  recipes: Recipe[];
  invalid: Array<{ file: string; message: string }>;
}

/**
 * Every <name>/<version>/recipe.json under recipesDir, sorted by name then version.
 * Invalid files are collected rather than thrown.
 */
export function listRecipes(recipesDir: string): RecipeListing {
  const listing: RecipeListing = { recipes: [], invalid: [] };
  if (!fs.existsSync(recipesDir)) return listing;

  const names = fs.readdirSync(recipesDir, { withFileTypes: true })
    .filter(d => d.isDirectory())
    .map(d => d.name)
    .sort();

  for (const name of names) {
    const versions = fs.readdirSync(path.join(recipesDir, name), { withFileTypes: true })
      .filter(d => d.isDirectory())
      .map(d => d.name)
      .sort(compareVersions);

    for (const version of versions) {
      const file = recipePath(recipesDir, name, version);
      if (!fs.existsSync(file)) continue;
      try {
        listing.recipes.push(loadRecipe(recipesDir, name, version));
      } catch (err) {
        listing.invalid.push({ file, message: err instanceof Error ? err.message : String(err) });
      }
    }
  }

  return listing;
}

/**
 * Compare dotted versions numerically where both parts are numbers,
 * lexically otherwise.
 */
export function compareVersions(a: string, b: string): number {
  const pa = a.split('.');
  const pb = b.split('.');
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const x = pa[i] ?? '';
    const y = pb[i] ?? '';
    if (x === y) continue;
    const nx = Number(x);
    const ny = Number(y);
    if (x !== '' && y !== '' && Number.isInteger(nx) && Number.isInteger(ny)) return nx - ny;
    return x < y ? -1 : 1;
  }
  return 0;
}

/**
 * Resolve a recipe to concrete phases: autotools sequence or explicit
 * phases, with PREFIX, NAME and VERSION substituted.
 */
export function expandRecipe(recipe: Recipe, prefix: string): Phase[] {
  const vars = { PREFIX: prefix, NAME: recipe.name, VERSION: recipe.version };
  const templates = recipe.phases ?? autotoolsPhases(recipe.autotools);
  return templates.map(t => ({
    name: t.name,
    command: expandTemplate(t.command, vars),
    args: t.args.map(a => expandTemplate(a, vars)),
  }));
}

/** Features a recipe enables with --with-X. */
export function recipeFeatures(recipe: Recipe): string[] {
  return recipe.autotools?.with ?? [];
}
