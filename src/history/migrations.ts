/**
 * Run history schema. Runs and their stage executions are append-only; a run
 * row is updated only while it is still `pending` or `running`.
 */

import type { Migrations } from '../db/migrations.js';

const MIGRATION_001 = `
CREATE TABLE IF NOT EXISTS pipeline_runs (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    pipeline_name   TEXT NOT NULL,
    trigger         TEXT NOT NULL DEFAULT 'schedule',
    status          TEXT NOT NULL,
    trigger_time    TEXT NOT NULL,
    started_at      TEXT,
    finished_at     TEXT,
    duration_ms     INTEGER,
    failed_stage    TEXT,
    error           TEXT
);

CREATE INDEX IF NOT EXISTS idx_pipeline_runs_name_time ON pipeline_runs(pipeline_name, trigger_time DESC);
CREATE INDEX IF NOT EXISTS idx_pipeline_runs_status ON pipeline_runs(status);

CREATE TABLE IF NOT EXISTS stage_executions (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id          INTEGER NOT NULL REFERENCES pipeline_runs(id) ON DELETE CASCADE,
    seq             INTEGER NOT NULL,
    stage_name      TEXT NOT NULL,
    attempt_count   INTEGER NOT NULL DEFAULT 0,
    status          TEXT NOT NULL,
    started_at      TEXT,
    ended_at        TEXT,
    duration_ms     INTEGER,
    input_payload   TEXT,
    output_payload  TEXT,
    error_kind      TEXT,
    error_message   TEXT,
    stdout_tail     TEXT,
    stderr_tail     TEXT,
    UNIQUE (run_id, seq)
);

CREATE INDEX IF NOT EXISTS idx_stage_executions_run ON stage_executions(run_id, seq);
`;

/** Run history migrations keyed by version. */
export const HISTORY_MIGRATIONS: Migrations = {
  1: MIGRATION_001,
};
