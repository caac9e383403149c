import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync, chmodSync, existsSync } from 'node:fs';
import { dirname } from 'node:path';
import { DEFAULT_DB_PATH } from '../config.js';
import { runMigrations } from './migrations.js';

export type Database = BetterSqlite3.Database;

let _db: Database | null = null;

/**
 * Returns the singleton Database instance, creating and migrating it on first call.
 * Pass `:memory:` as dbPath for in-memory testing.
 */
export function getDb(dbPath?: string): Database {
  if (_db) return _db;

  const resolvedPath = dbPath ?? DEFAULT_DB_PATH;
  const isMemory = resolvedPath === ':memory:';

  if (!isMemory) {
    const dir = dirname(resolvedPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
  }

  const db = new BetterSqlite3(resolvedPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');

  if (!isMemory) {
    // Statements carry account numbers: owner-only file.
    chmodSync(resolvedPath, 0o600);
  }

  runMigrations(db);
  _db = db;
  return db;
}

/**
 * Reset the singleton. Tests use it to get a fresh DB.
 */
export function resetDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
