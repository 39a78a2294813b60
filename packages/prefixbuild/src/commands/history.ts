import { getDb, findProjectRoot } from '../db/connection.js';
import { listRuns, getRunWithPhases } from '../db/queries.js';
import { getFlagValue, positionalArgs } from '../config.js';
import { ConfigError, NotInProjectError } from '../errors.js';
import * as fmt from '../output/format.js';

export async function history(args: string[], isJson: boolean): Promise<void> {
  const root = findProjectRoot();
  if (!root) throw new NotInProjectError();
  const db = getDb(root);

  const [runArg] = positionalArgs(args, ['--recipe', '--limit']);
  if (runArg !== undefined) {
    const found = getRunWithPhases(db, Number(runArg));
    if (!found) throw new ConfigError(`No run with id ${runArg}`);

    if (isJson) {
      console.log(JSON.stringify(found, null, 2));
      return;
    }

    const { run, phases } = found;
    fmt.header(`Run ${run.id}: ${run.recipe} ${run.version}`);
    console.log(`  Kind:    ${run.kind}`);
    console.log(`  Status:  ${fmt.statusColor(run.status)}`);
    console.log(`  Prefix:  ${run.prefix ?? '—'}`);
    console.log(`  Source:  ${run.source_dir ?? '—'}`);
    console.log(`  Started: ${run.started_at}\n`);
    if (phases.length > 0) {
      console.log(fmt.table(
        ['#', 'Phase', 'Exit', 'Duration', 'Command'],
        phases.map(p => [String(p.seq), p.name, fmt.exitCodeColor(p.exit_code), `${p.duration_ms}ms`, p.command_line]),
      ));
    }
    return;
  }

  const limitArg = getFlagValue(args, '--limit');
  const limit = limitArg === undefined ? undefined : Number(limitArg);
  if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
    throw new ConfigError(`--limit must be a positive integer, got "${limitArg}"`);
  }
  const runs = listRuns(db, { recipe: getFlagValue(args, '--recipe'), limit });

  if (isJson) {
    console.log(JSON.stringify(runs, null, 2));
    return;
  }

  fmt.header('Build History');
  if (runs.length === 0) {
    console.log('  No runs recorded.\n');
    return;
  }
  console.log(fmt.table(
    ['ID', 'Kind', 'Recipe', 'Version', 'Status', 'Exit', 'Started'],
    runs.map(r => [
      String(r.id), r.kind, r.recipe, r.version,
      fmt.statusColor(r.status), fmt.exitCodeColor(r.exit_code), r.started_at,
    ]),
  ));
}
