import type Database from 'better-sqlite3';
import { recordRunStart, recordRunFinish, recordPhase } from '../db/queries.js';
import { getDb } from '../db/connection.js';
import type { PhaseResult, RunKind } from '../types.js';
import * as fmt from '../output/format.js';

/**
 * Writes build history. Every method is non-fatal: a history failure is
 * logged as a warning and the build carries on.
 */
export interface RunRecorder {
  start(kind: RunKind, recipe: string, version: string, prefix: string | null, sourceDir: string | null): number | null;
  phase(runId: number | null, seq: number, phase: PhaseResult): void;
  finish(runId: number | null, exitCode: number): void;
}

export const nullRecorder: RunRecorder = {
  start: () => null,
  phase: () => {},
  finish: () => {},
};

export function dbRecorder(db: Database.Database): RunRecorder {
  return {
    start(kind, recipe, version, prefix, sourceDir) {
      try {
        return recordRunStart(db, kind, recipe, version, prefix, sourceDir).id;
      } catch (err) {
        fmt.warn(`Could not record run: ${err instanceof Error ? err.message : String(err)}`);
        return null;
      }
    },
    phase(runId, seq, phase) {
      if (runId === null) return;
      try {
        recordPhase(db, runId, seq, phase);
      } catch (err) {
        fmt.warn(`Could not record phase ${phase.name}: ${err instanceof Error ? err.message : String(err)}`);
      }
    },
    finish(runId, exitCode) {
      if (runId === null) return;
      try {
        recordRunFinish(db, runId, exitCode);
      } catch (err) {
        fmt.warn(`Could not record run result: ${err instanceof Error ? err.message : String(err)}`);
      }
    },
  };
}

/**
 * The project's history recorder, or nullRecorder when recording is off,
 * there is no project, or the database cannot be opened (with a warning).
 */
export function openRecorder(root: string | null, enabled: boolean): RunRecorder {
  if (!enabled || !root) return nullRecorder;
  try {
    return dbRecorder(getDb(root));
  } catch (err) {
    fmt.warn(`History disabled: ${err instanceof Error ? err.message : String(err)}`);
    return nullRecorder;
  }
}
