import type Database from 'better-sqlite3';

/**
 * Migration system using user_version pragma; no migration table.
 * Each migration is an array index: migration[0] upgrades from version 0 to 1, etc.
 */

type Migration = (db: Database.Database) => void;

const migrations: Migration[] = [
  // Migration 001: v0 → v1, runs and their phases
  (db) => {
    db.exec(`
      CREATE TABLE runs (
        id INTEGER PRIMARY KEY,
        kind TEXT NOT NULL CHECK(kind IN ('local', 'docker')),
        recipe TEXT NOT NULL,
        version TEXT NOT NULL,
        prefix TEXT,
        source_dir TEXT,
        status TEXT NOT NULL DEFAULT 'running' CHECK(
          status IN ('running', 'succeeded', 'failed')
        ),
        exit_code INTEGER,
        started_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        finished_at DATETIME
      );

      CREATE TABLE phase_runs (
        id INTEGER PRIMARY KEY,
        run_id INTEGER NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        seq INTEGER NOT NULL,
        name TEXT NOT NULL,
        command_line TEXT NOT NULL,
        exit_code INTEGER NOT NULL,
        duration_ms INTEGER NOT NULL,
        started_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        UNIQUE(run_id, seq)
      );

      CREATE INDEX idx_runs_recipe ON runs(recipe, version);
      CREATE INDEX idx_phase_runs_run ON phase_runs(run_id);
    `);
  },
];

/**
 * Run all pending migrations. Uses user_version pragma for tracking.
 */
export function runMigrations(db: Database.Database): void {
  const currentVersion = db.pragma('user_version', { simple: true }) as number;

  for (let i = currentVersion; i < migrations.length; i++) {
    db.transaction(() => {
      migrations[i](db);
      db.pragma(`user_version = ${i + 1}`);
    })();
  }
}

export const SCHEMA_VERSION = migrations.length;
