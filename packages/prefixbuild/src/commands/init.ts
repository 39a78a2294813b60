import * as fs from 'node:fs';
import * as path from 'node:path';
import { configTemplate, mkdirSafe } from '@prefixbuild/shared';
import { openDbAt, STATE_DIR } from '../db/connection.js';
import { resetConfigCache, getFlagValue, getFlagList, hasFlag, loadConfig } from '../config.js';
import * as fmt from '../output/format.js';

/**
 * Set up .prefixbuild/ in the current directory: config, history database,
 * and the recipes directory. Existing files are left alone.
 */
export async function init(args: string[], cwd: string = process.cwd()): Promise<void> {
  const root = path.resolve(cwd);
  const stateDir = path.join(root, STATE_DIR);
  const configPath = path.join(stateDir, 'config.json');

  fmt.header('Initializing prefixbuild');

  mkdirSafe(stateDir);

  if (fs.existsSync(configPath)) {
    fmt.info('config.json already exists, keeping it.');
  } else {
    const channels = getFlagList(args, '--build-channel', '--build-channels');
    fs.writeFileSync(configPath, configTemplate({
      recipesDir: getFlagValue(args, '--recipes'),
      recordHistory: hasFlag(args, '--no-history') ? false : undefined,
      buildChannels: channels.length > 0 ? channels : undefined,
    }) + '\n');
    fmt.success(`Wrote ${path.relative(root, configPath)}`);
  }

  const db = openDbAt(root);
  db.close();
  fmt.success(`History database ready at ${path.join(STATE_DIR, 'prefixbuild.db')}`);

  resetConfigCache();
  const recipesDir = path.resolve(root, loadConfig(root).recipes.dir);
  if (mkdirSafe(recipesDir)) {
    fmt.success(`Created ${path.relative(root, recipesDir) || '.'}/`);
  }
}
