import type Database from 'better-sqlite3';
import type { PhaseResult, PhaseRun, Run, RunKind } from '../types.js';

/**
 * All database operations as named functions using prepared statements.
 * Each function takes a db instance so we can test with in-memory DBs.
 */

// ── Runs ─────────────────────────────────────────────────────

export function recordRunStart(
  db: Database.Database,
  kind: RunKind,
  recipe: string,
  version: string,
  prefix: string | null,
  sourceDir: string | null,
): Run {
  const result = db.prepare(`
    INSERT INTO runs (kind, recipe, version, prefix, source_dir, status)
    VALUES (?, ?, ?, ?, ?, 'running')
  `).run(kind, recipe, version, prefix, sourceDir);
  return getRunById(db, Number(result.lastInsertRowid))!;
}

export function recordRunFinish(db: Database.Database, runId: number, exitCode: number): void {
  db.prepare(`
    UPDATE runs SET status = ?, exit_code = ?, finished_at = CURRENT_TIMESTAMP WHERE id = ?
  `).run(exitCode === 0 ? 'succeeded' : 'failed', exitCode, runId);
}

export function getRunById(db: Database.Database, id: number): Run | null {
  return (db.prepare('SELECT * FROM runs WHERE id = ?').get(id) as Run | undefined) ?? null;
}

export interface RunFilter {
  recipe?: string;
  limit?: number;
}

/** Most recent first. */
export function listRuns(db: Database.Database, filter: RunFilter = {}): Run[] {
  const limit = filter.limit ?? 20;
  if (filter.recipe) {
    return db.prepare(`
      SELECT * FROM runs WHERE recipe = ? ORDER BY id DESC LIMIT ?
    `).all(filter.recipe, limit) as Run[];
  }
  return db.prepare('SELECT * FROM runs ORDER BY id DESC LIMIT ?').all(limit) as Run[];
}

/** The newest run of each recipe/version, ordered by recipe then version. */
export function latestRunPerRecipe(db: Database.Database): Run[] {
  return db.prepare(`
    SELECT r.* FROM runs r
    JOIN (SELECT recipe, version, MAX(id) AS max_id FROM runs GROUP BY recipe, version) latest
      ON r.id = latest.max_id
    ORDER BY r.recipe, r.version
  `).all() as Run[];
}

// ── Phases ───────────────────────────────────────────────────

export function recordPhase(db: Database.Database, runId: number, seq: number, phase: PhaseResult): PhaseRun {
  const result = db.prepare(`
    INSERT INTO phase_runs (run_id, seq, name, command_line, exit_code, duration_ms)
    VALUES (?, ?, ?, ?, ?, ?)
  `).run(runId, seq, phase.name, phase.commandLine, phase.exitCode, Math.round(phase.durationMs));
  return db.prepare('SELECT * FROM phase_runs WHERE id = ?').get(result.lastInsertRowid) as PhaseRun;
}

export function getPhasesByRun(db: Database.Database, runId: number): PhaseRun[] {
  return db.prepare('SELECT * FROM phase_runs WHERE run_id = ? ORDER BY seq').all(runId) as PhaseRun[];
}

export function getRunWithPhases(db: Database.Database, runId: number): { run: Run; phases: PhaseRun[] } | null {
  const run = getRunById(db, runId);
  if (!run) return null;
  return { run, phases: getPhasesByRun(db, runId) };
}
