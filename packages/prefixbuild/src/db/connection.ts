import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { runMigrations } from './migrations.js';
import { NotInProjectError } from '../errors.js';

export const STATE_DIR = '.prefixbuild';
export const DB_FILE = 'prefixbuild.db';

let _db: Database.Database | null = null;

/**
 * Walk up from startDir looking for a directory containing `.prefixbuild/`.
 */
export function findProjectRoot(startDir?: string): string | null {
  let dir = path.resolve(startDir ?? process.cwd());

  while (true) {
    if (fs.existsSync(path.join(dir, STATE_DIR))) {
      return dir;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Get the singleton database connection.
 * Opens .prefixbuild/prefixbuild.db with WAL mode and foreign keys.
 * Auto-runs migrations on first connection.
 */
export function getDb(projectRoot?: string): Database.Database {
  if (_db) return _db;

  const root = projectRoot ?? findProjectRoot();
  if (!root) throw new NotInProjectError();

  _db = openDbAt(root);
  return _db;
}

/**
 * Open (creating if needed) the database of a specific project root.
 * Does NOT set the singleton.
 */
export function openDbAt(root: string): Database.Database {
  const stateDir = path.join(root, STATE_DIR);
  if (!fs.existsSync(stateDir)) {
    fs.mkdirSync(stateDir, { recursive: true });
  }
  return open(path.join(stateDir, DB_FILE));
}

/**
 * Close the singleton DB connection. Used in tests.
 */
export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

/**
 * Open a fresh in-memory database for testing. Does NOT set the singleton.
 */
export function openTestDb(): Database.Database {
  return open(':memory:');
}

function open(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return db;
}
