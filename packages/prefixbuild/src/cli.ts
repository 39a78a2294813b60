#!/usr/bin/env node

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import * as fmt from './output/format.js';
import { requestShutdown } from './shutdown.js';
import { exitCodeOf } from './errors.js';
import { hasFlag } from './config.js';

const VERSION: string = JSON.parse(
  fs.readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf-8'),
).version;

async function main(): Promise<void> {
  // Ctrl+C: the running phase gets the signal too; stop before the next one
  let sigintCount = 0;
  process.on('SIGINT', () => {
    sigintCount++;
    if (sigintCount >= 2) process.exit(130);
    requestShutdown();
    fmt.warn('Interrupt received. Stopping after the current step...');
  });

  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    return;
  }

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    printHelp();
    return;
  }

  const isJson = args.includes('--json');
  const command = args[0];
  const rest = args.slice(1).filter(a => a !== '--json');

  fmt.setLogLevel(fmt.levelFromFlags({
    debug: hasFlag(rest, '--debug'),
    verbose: hasFlag(rest, '--verbose'),
    dryRun: hasFlag(rest, '--dry-run'),
  }, command === 'batch' ? 'error' : 'info'));

  try {
    switch (command) {
      case 'build': {
        const { build } = await import('./commands/build.js');
        await build(rest);
        break;
      }
      case 'batch': {
        const { batch } = await import('./commands/batch.js');
        await batch(rest);
        break;
      }
      case 'recipes': {
        const { recipes } = await import('./commands/recipes.js');
        await recipes(rest, isJson);
        break;
      }
      case 'init': {
        const { init } = await import('./commands/init.js');
        await init(rest);
        break;
      }
      case 'doctor': {
        const { doctor } = await import('./commands/doctor.js');
        await doctor(rest);
        break;
      }
      case 'history': {
        const { history } = await import('./commands/history.js');
        await history(rest, isJson);
        break;
      }
      case 'status': {
        const { status } = await import('./commands/status.js');
        await status(isJson);
        break;
      }
      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        process.exit(1);
    }
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    fmt.error(`Error: ${msg}`);
    process.exit(exitCodeOf(err));
  }
}

function printHelp(): void {
  console.log(`
prefixbuild v${VERSION}: build and install autotools packages into a prefix

Usage: prefixbuild <command> [options]

Build:
  build [name version]       Run autoreconf, configure and make install
    --prefix DIR             Install prefix (default: $PREFIX)
    --source DIR             Source tree (default: current directory)
    --recipes DIR            Recipe directory (default: from config)
    --dry-run                Print the commands, run nothing
    --no-record              Do not write build history
  batch                      Build conda recipes in Docker, one
                             "<name> <version> <path>" per stdin line
    --recipes-dir DIR        Host recipes directory
    --recipes-mount DIR      Container recipes mount
    --artefacts-dir DIR      Host build artefacts directory
    --artefacts-mount DIR    Container build artefacts mount
    --build-channel C...     Extra conda channels
    --irods-build-image IMG  Image for iRODS 4.1.x
    --conda-build-image IMG  Image for everything else
    --remove-container       Remove the container after each build
    --conda-uid N            UID for the conda user in the container
    --conda-gid N            GID for the conda user in the container
    --dry-run                Log the docker commands, run nothing

Project:
  init                       Create .prefixbuild/ (config, history, recipes dir)
    --recipes DIR            Recipe directory to write into the config
    --no-history             Turn build history off in the config
    --build-channel C...     Conda channels for batch builds
  recipes [--json]           List recipes
  doctor [name version]      Check PREFIX, tools and sources before a build
  history [run-id] [--json]  Past runs (--recipe NAME, --limit N)
  status [--json]            Latest run of each recipe

Flags:
  --verbose                  Info-level logging
  --debug                    Debug-level logging
  --json                     Output as JSON
  --version, -v              Print version
  --help, -h                 Print this help
`);
}

main().catch((err: unknown) => {
  fmt.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(exitCodeOf(err));
});
