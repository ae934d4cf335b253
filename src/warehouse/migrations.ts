/**
 * Warehouse schema. The raw tables are filled by the load stage; `fct_messages`
 * is rebuilt by the transform project and created here only so the read API
 * answers before the first transformation has run.
 */

import type { Migrations } from '../db/migrations.js';

const MIGRATION_001 = `
CREATE TABLE IF NOT EXISTS raw_telegram_messages (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    channel_username  TEXT NOT NULL,
    message_date      TEXT,
    message_data      TEXT NOT NULL,
    loaded_at         TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE IF NOT EXISTS raw_telegram_media (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    channel_username  TEXT NOT NULL,
    media_date        TEXT,
    media_data        TEXT NOT NULL,
    loaded_at         TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE IF NOT EXISTS loaded_files (
    path        TEXT PRIMARY KEY,
    kind        TEXT NOT NULL,
    channel     TEXT NOT NULL,
    row_count   INTEGER NOT NULL,
    loaded_at   TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);

CREATE TABLE IF NOT EXISTS fct_messages (
    message_id    INTEGER,
    channel_id    TEXT,
    message_text  TEXT,
    media_date    TEXT,
    has_image     INTEGER
);

CREATE INDEX IF NOT EXISTS idx_fct_messages_channel ON fct_messages(channel_id, media_date);
`;

/** Warehouse migrations keyed by version. */
export const WAREHOUSE_MIGRATIONS: Migrations = {
  1: MIGRATION_001,
};
