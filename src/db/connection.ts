/**
 * SQLite connection manager using better-sqlite3.
 *
 * @module
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import Database from 'better-sqlite3';

/** Open database handle. */
export type Db = Database.Database;

export interface ConnectionOptions {
  /** Database file path, or `:memory:`. */
  dbPath: string;
}

/** Open a database, creating its parent directory, with WAL and foreign keys enabled. */
export function createConnection(options: ConnectionOptions): Db {
  const { dbPath } = options;
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  return db;
}

/** Close a database handle. */
export function closeConnection(db: Db): void {
  if (db.open) db.close();
}
