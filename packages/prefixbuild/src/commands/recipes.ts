import { findProjectRoot } from '../db/connection.js';
import { loadConfig } from '../config.js';
import { listRecipes, recipeFeatures } from '../recipe/load.js';
import { resolveRecipesDir } from './build.js';
import * as fmt from '../output/format.js';

export async function recipes(args: string[], isJson: boolean): Promise<void> {
  const root = findProjectRoot();
  const dir = resolveRecipesDir(args, root, loadConfig(root));
  const { recipes: found, invalid } = listRecipes(dir);

  if (isJson) {
    console.log(JSON.stringify({ dir, recipes: found, invalid }, null, 2));
    return;
  }

  fmt.header(`Recipes in ${dir}`);

  if (found.length === 0) {
    console.log('  No recipes found.\n');
  } else {
    console.log(fmt.table(
      ['Name', 'Version', 'Kind', 'Features'],
      found.map(r => [
        r.name,
        r.version,
        r.phases ? `${r.phases.length} phase(s)` : 'autotools',
        recipeFeatures(r).join(', ') || '—',
      ]),
    ));
  }

  for (const bad of invalid) {
    fmt.warn(`Skipped ${bad.file}: ${bad.message}`);
  }
}
