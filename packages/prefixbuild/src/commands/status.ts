import { getDb, findProjectRoot } from '../db/connection.js';
import { latestRunPerRecipe } from '../db/queries.js';
import { NotInProjectError } from '../errors.js';
import type { Run } from '../types.js';
import * as fmt from '../output/format.js';

export async function status(isJson: boolean): Promise<void> {
  const root = findProjectRoot();
  if (!root) throw new NotInProjectError();

  const latest = latestRunPerRecipe(getDb(root));

  if (isJson) {
    console.log(JSON.stringify({ summary: buildSummary(latest), latest }, null, 2));
    return;
  }

  fmt.header('Project Status');

  if (latest.length === 0) {
    console.log('  No builds recorded.\n');
    return;
  }

  console.log(fmt.table(
    ['Recipe', 'Version', 'Last Run', 'Status', 'Exit', 'Finished'],
    latest.map(r => [
      r.recipe, r.version, String(r.id),
      fmt.statusColor(r.status), fmt.exitCodeColor(r.exit_code), r.finished_at ?? '—',
    ]),
  ));
  console.log(`\n  ${buildSummary(latest)}`);
}

export function buildSummary(latest: Run[]): string {
  const ok = latest.filter(r => r.status === 'succeeded').length;
  const failed = latest.filter(r => r.status === 'failed').length;
  const running = latest.length - ok - failed;
  const parts = [`${latest.length} recipe version(s)`, `${ok} succeeded`, `${failed} failed`];
  if (running > 0) parts.push(`${running} unfinished`);
  return parts.join(', ');
}
