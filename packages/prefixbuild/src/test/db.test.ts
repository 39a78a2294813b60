import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { openTestDb, openDbAt, findProjectRoot, STATE_DIR, DB_FILE } from '../db/connection.js';
import { runMigrations, SCHEMA_VERSION } from '../db/migrations.js';
import {
  recordRunStart,
  recordRunFinish,
  getRunById,
  listRuns,
  latestRunPerRecipe,
  recordPhase,
  getPhasesByRun,
  getRunWithPhases,
} from '../db/queries.js';
import { buildSummary } from '../commands/status.js';
import type Database from 'better-sqlite3';

let db: Database.Database;

beforeEach(() => {
  db = openTestDb();
});

afterEach(() => {
  db.close();
});

describe('Migrations', () => {
  it('creates the runs and phase_runs tables', () => {
    const tables = db.prepare(`
      SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'
    `).all() as Array<{ name: string }>;
    assert.deepEqual(tables.map(t => t.name).sort(), ['phase_runs', 'runs']);
  });

  it('sets user_version and is idempotent', () => {
    assert.equal(db.pragma('user_version', { simple: true }), SCHEMA_VERSION);
    runMigrations(db);
    assert.equal(db.pragma('user_version', { simple: true }), SCHEMA_VERSION);
  });

  it('enforces the kind constraint', () => {
    assert.throws(() => db.prepare(`
      INSERT INTO runs (kind, recipe, version) VALUES ('remote', 'a', '1')
    `).run());
  });
});

describe('Runs', () => {
  it('starts a run as running with no exit code', () => {
    const run = recordRunStart(db, 'local', 'tears', '1.2.3', '/opt/x', '/src/tears');
    assert.equal(run.kind, 'local');
    assert.equal(run.recipe, 'tears');
    assert.equal(run.prefix, '/opt/x');
    assert.equal(run.source_dir, '/src/tears');
    assert.equal(run.status, 'running');
    assert.equal(run.exit_code, null);
    assert.equal(run.finished_at, null);
  });

  it('finishes as succeeded on exit 0, failed otherwise', () => {
    const ok = recordRunStart(db, 'local', 'a', '1', '/p', null);
    const bad = recordRunStart(db, 'docker', 'b', '1', null, 'b');
    recordRunFinish(db, ok.id, 0);
    recordRunFinish(db, bad.id, 2);

    const okRow = getRunById(db, ok.id);
    const badRow = getRunById(db, bad.id);
    assert.equal(okRow?.status, 'succeeded');
    assert.equal(okRow?.exit_code, 0);
    assert.notEqual(okRow?.finished_at, null);
    assert.equal(badRow?.status, 'failed');
    assert.equal(badRow?.exit_code, 2);
  });

  it('returns null for an unknown id', () => {
    assert.equal(getRunById(db, 999), null);
    assert.equal(getRunWithPhases(db, 999), null);
  });

  it('lists newest first, filtered and limited', () => {
    recordRunStart(db, 'local', 'a', '1', '/p', null);
    recordRunStart(db, 'local', 'b', '1', '/p', null);
    recordRunStart(db, 'local', 'a', '2', '/p', null);

    assert.deepEqual(listRuns(db).map(r => [r.recipe, r.version]), [['a', '2'], ['b', '1'], ['a', '1']]);
    assert.deepEqual(listRuns(db, { recipe: 'a' }).map(r => r.version), ['2', '1']);
    assert.equal(listRuns(db, { limit: 1 }).length, 1);
  });

  it('keeps only the newest run of each recipe version', () => {
    const first = recordRunStart(db, 'local', 'tears', '1.2.3', '/p', null);
    recordRunFinish(db, first.id, 1);
    const second = recordRunStart(db, 'local', 'tears', '1.2.3', '/p', null);
    recordRunFinish(db, second.id, 0);
    recordRunStart(db, 'docker', 'irods', '4.1.12', null, 'irods');

    const latest = latestRunPerRecipe(db);
    assert.deepEqual(latest.map(r => [r.recipe, r.id, r.status]), [
      ['irods', 3, 'running'],
      ['tears', second.id, 'succeeded'],
    ]);
    assert.equal(buildSummary(latest), '2 recipe version(s), 1 succeeded, 0 failed, 1 unfinished');
  });
});

describe('Phases', () => {
  it('records phases in order with rounded durations', () => {
    const run = recordRunStart(db, 'local', 'tears', '1.2.3', '/p', '/src');
    recordPhase(db, run.id, 2, { name: 'configure', commandLine: './configure --prefix=/p', exitCode: 1, durationMs: 10.6 });
    const first = recordPhase(db, run.id, 1, { name: 'autoreconf', commandLine: 'autoreconf -fi', exitCode: 0, durationMs: 3.2 });

    assert.equal(first.duration_ms, 3);
    const phases = getPhasesByRun(db, run.id);
    assert.deepEqual(phases.map(p => [p.seq, p.name, p.exit_code, p.duration_ms]), [
      [1, 'autoreconf', 0, 3],
      [2, 'configure', 1, 11],
    ]);
    assert.equal(getRunWithPhases(db, run.id)?.phases.length, 2);
  });

  it('rejects a duplicate sequence number', () => {
    const run = recordRunStart(db, 'local', 'a', '1', '/p', null);
    const phase = { name: 'x', commandLine: 'x', exitCode: 0, durationMs: 1 };
    recordPhase(db, run.id, 1, phase);
    assert.throws(() => recordPhase(db, run.id, 1, phase));
  });

  it('rejects a phase for a missing run', () => {
    assert.throws(() => recordPhase(db, 42, 1, { name: 'x', commandLine: 'x', exitCode: 0, durationMs: 1 }));
  });
});

describe('Project database', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'prefixbuild-db-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates the state directory and database file', () => {
    const projectDb = openDbAt(tmpDir);
    projectDb.close();
    assert.ok(fs.existsSync(path.join(tmpDir, STATE_DIR, DB_FILE)));
  });

  it('finds the project root from a subdirectory', () => {
    fs.mkdirSync(path.join(tmpDir, STATE_DIR));
    const nested = path.join(tmpDir, 'src', 'deep');
    fs.mkdirSync(nested, { recursive: true });
    assert.equal(findProjectRoot(nested), path.resolve(tmpDir));
  });
});
