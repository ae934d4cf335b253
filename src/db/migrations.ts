/**
 * Schema migration runner. Tracks applied migrations via schema_version table,
 * applies pending migrations idempotently. Each database (run history,
 * warehouse) supplies its own migration set.
 */

import type { Db } from './connection.js';

/** Migration SQL keyed by version number. */
export type Migrations = Readonly<Record<number, string>>;

/** Current schema version of a database (0 when no migration has run). */
export function schemaVersion(db: Db): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT DEFAULT (datetime('now'))
    );
  `);

  const row = db
    .prepare<[], { version: number | null }>(
      'SELECT MAX(version) as version FROM schema_version',
    )
    .get();
  return row?.version ?? 0;
}

/** Apply pending migrations in version order, each in its own transaction. */
export function runMigrations(db: Db, migrations: Migrations): number[] {
  const currentVersion = schemaVersion(db);

  const pendingVersions = Object.keys(migrations)
    .map(Number)
    .filter((v) => v > currentVersion)
    .sort((a, b) => a - b);

  const record = db.prepare<[number]>(
    'INSERT INTO schema_version (version) VALUES (?)',
  );
  const apply = db.transaction((version: number, sql: string) => {
    db.exec(sql);
    record.run(version);
  });

  for (const version of pendingVersions) {
    apply(version, migrations[version]);
  }
  return pendingVersions;
}
