/**
 * SQLite connection bootstrap
 *
 * Opens the better-sqlite3 database, applies connection pragmas and runs any
 * pending migrations inside a transaction each.
 */

import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import { MIGRATIONS, type Migration } from './migrations/index.js';

const MIGRATIONS_TABLE_SQL = `
CREATE TABLE IF NOT EXISTS schema_migrations (
  version INTEGER PRIMARY KEY,
  name TEXT NOT NULL,
  applied_at TEXT DEFAULT (datetime('now')) NOT NULL
);
`;

export function openDatabase(filename: string, logger?: Logger): Database.Database {
  const db = new Database(filename);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');

  const applied = runMigrations(db, MIGRATIONS);
  logger?.info({ filename, applied }, 'Database ready');

  return db;
}

/**
 * Applies migrations newer than the recorded schema version.
 * Returns the versions applied by this call.
 */
export function runMigrations(db: Database.Database, migrations: readonly Migration[]): number[] {
  db.exec(MIGRATIONS_TABLE_SQL);

  const row = db.prepare('SELECT MAX(version) AS version FROM schema_migrations').get() as
    | { version: number | null }
    | undefined;
  const current = row?.version ?? 0;

  const pending = [...migrations]
    .filter((migration) => migration.version > current)
    .sort((a, b) => a.version - b.version);

  const record = db.prepare('INSERT INTO schema_migrations (version, name) VALUES (?, ?)');
  for (const migration of pending) {
    db.transaction(() => {
      db.exec(migration.sql);
      record.run(migration.version, migration.name);
    })();
  }

  return pending.map((migration) => migration.version);
}
