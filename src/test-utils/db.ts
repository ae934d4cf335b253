/**
 * Test database helpers: in-memory history and warehouse databases with
 * migrations applied.
 */

import { closeConnection, createConnection, type Db } from '../db/connection.js';
import { runMigrations } from '../db/migrations.js';
import { HISTORY_MIGRATIONS } from '../history/migrations.js';
import { WAREHOUSE_MIGRATIONS } from '../warehouse/migrations.js';

export interface TestDb {
  db: Db;
  cleanup: () => void;
}

function createMigrated(migrations: typeof HISTORY_MIGRATIONS): TestDb {
  const db = createConnection({ dbPath: ':memory:' });
  runMigrations(db, migrations);
  return { db, cleanup: () => closeConnection(db) };
}

/** In-memory run history database. */
export function createTestDb(): TestDb {
  return createMigrated(HISTORY_MIGRATIONS);
}

/** In-memory warehouse database. */
export function createTestWarehouse(): TestDb {
  return createMigrated(WAREHOUSE_MIGRATIONS);
}
