/**
 * Run history repository. Persists runs and stage executions and answers
 * provenance queries by pipeline and time range.
 *
 * @module
 */

import type { Db } from '../db/connection.js';
import {
  failureKindSchema,
  type Run,
  type RunStatus,
  runStatusSchema,
  type RunTrigger,
  runTriggerSchema,
  type StageExecution,
  type StagePayload,
  stagePayloadSchema,
  stageStatusSchema,
} from '../schemas/run.js';

interface RunRow {
  id: number;
  pipeline_name: string;
  trigger: string;
  status: string;
  trigger_time: string;
  started_at: string | null;
  finished_at: string | null;
  duration_ms: number | null;
  failed_stage: string | null;
  error: string | null;
}

interface StageRow {
  run_id: number;
  stage_name: string;
  attempt_count: number;
  status: string;
  started_at: string | null;
  ended_at: string | null;
  duration_ms: number | null;
  input_payload: string | null;
  output_payload: string | null;
  error_kind: string | null;
  error_message: string | null;
  stdout_tail: string | null;
  stderr_tail: string | null;
}

/** Terminal state written when a run resolves. */
export interface RunCompletion {
  status: Extract<RunStatus, 'succeeded' | 'failed'>;
  finishedAt: string;
  durationMs: number;
  failedStage?: string;
  error?: string;
}

/** Filter for {@link RunRepository.listRuns}. */
export interface RunFilter {
  pipelineName?: string;
  /** Inclusive lower bound on trigger time (ISO). */
  since?: string;
  /** Exclusive upper bound on trigger time (ISO). */
  until?: string;
  status?: RunStatus;
  /** Maximum rows, newest first. Defaults to 50. */
  limit?: number;
}

/** Run record repository operations. */
export interface RunRepository {
  /** Insert a `pending` run and return it. */
  createRun(pipelineName: string, trigger: RunTrigger, triggerTime: string): Run;
  /** Move a pending run to `running`. */
  startRun(runId: number, startedAt: string): void;
  /** Append a resolved stage execution. */
  recordStage(runId: number, execution: StageExecution): void;
  /** Mark a run terminal and return the stored record. */
  finishRun(runId: number, completion: RunCompletion): Run;
  getRun(runId: number): Run | null;
  listRuns(filter?: RunFilter): Run[];
  /** Most recent run of a pipeline. */
  lastRun(pipelineName: string): Run | null;
  /** Run counts per status, optionally only runs triggered at or after `since`. */
  countByStatus(since?: string): Record<RunStatus, number>;
}

const parsePayload = (json: string | null): StagePayload | undefined =>
  json === null ? undefined : stagePayloadSchema.parse(JSON.parse(json));

function toStageExecution(row: StageRow): StageExecution {
  return {
    stageName: row.stage_name,
    attemptCount: row.attempt_count,
    status: stageStatusSchema.parse(row.status),
    startedAt: row.started_at ?? undefined,
    endedAt: row.ended_at ?? undefined,
    durationMs: row.duration_ms ?? undefined,
    input: parsePayload(row.input_payload),
    output: parsePayload(row.output_payload),
    errorKind:
      row.error_kind === null ? undefined : failureKindSchema.parse(row.error_kind),
    errorMessage: row.error_message ?? undefined,
    stdoutTail: row.stdout_tail ?? undefined,
    stderrTail: row.stderr_tail ?? undefined,
  };
}

function toRun(row: RunRow, stages: StageExecution[]): Run {
  return {
    id: row.id,
    pipelineName: row.pipeline_name,
    status: runStatusSchema.parse(row.status),
    trigger: runTriggerSchema.parse(row.trigger),
    triggerTime: row.trigger_time,
    startedAt: row.started_at ?? undefined,
    finishedAt: row.finished_at ?? undefined,
    durationMs: row.duration_ms ?? undefined,
    failedStage: row.failed_stage ?? undefined,
    error: row.error ?? undefined,
    stages,
  };
}

const RUN_COLUMNS = `id, pipeline_name, trigger, status, trigger_time, started_at,
  finished_at, duration_ms, failed_stage, error`;

/** Create a run repository for the given database connection. */
export function createRunRepository(db: Db): RunRepository {
  const selectRun = db.prepare<[number], RunRow>(
    `SELECT ${RUN_COLUMNS} FROM pipeline_runs WHERE id = ?`,
  );
  const selectStages = db.prepare<[number], StageRow>(
    `SELECT * FROM stage_executions WHERE run_id = ? ORDER BY seq`,
  );

  function hydrate(rows: RunRow[]): Run[] {
    return rows.map((row) => toRun(row, selectStages.all(row.id).map(toStageExecution)));
  }

  function getRun(runId: number): Run | null {
    const row = selectRun.get(runId);
    return row ? toRun(row, selectStages.all(row.id).map(toStageExecution)) : null;
  }

  function requireRun(runId: number): Run {
    const run = getRun(runId);
    if (!run) throw new Error(`Run not found: ${String(runId)}`);
    return run;
  }

  return {
    createRun(pipelineName, trigger, triggerTime): Run {
      const result = db
        .prepare<[string, string, string]>(
          `INSERT INTO pipeline_runs (pipeline_name, trigger, status, trigger_time)
           VALUES (?, ?, 'pending', ?)`,
        )
        .run(pipelineName, trigger, triggerTime);
      return requireRun(Number(result.lastInsertRowid));
    },

    startRun(runId, startedAt): void {
      db.prepare<[string, number]>(
        `UPDATE pipeline_runs SET status = 'running', started_at = ?
         WHERE id = ? AND status = 'pending'`,
      ).run(startedAt, runId);
    },

    recordStage(runId, execution): void {
      db.prepare(
        `INSERT INTO stage_executions (run_id, seq, stage_name, attempt_count, status,
           started_at, ended_at, duration_ms, input_payload, output_payload,
           error_kind, error_message, stdout_tail, stderr_tail)
         VALUES (@runId,
           (SELECT COUNT(*) FROM stage_executions WHERE run_id = @runId),
           @stageName, @attemptCount, @status, @startedAt, @endedAt, @durationMs,
           @input, @output, @errorKind, @errorMessage, @stdoutTail, @stderrTail)`,
      ).run({
        runId,
        stageName: execution.stageName,
        attemptCount: execution.attemptCount,
        status: execution.status,
        startedAt: execution.startedAt ?? null,
        endedAt: execution.endedAt ?? null,
        durationMs: execution.durationMs ?? null,
        input: execution.input ? JSON.stringify(execution.input) : null,
        output: execution.output ? JSON.stringify(execution.output) : null,
        errorKind: execution.errorKind ?? null,
        errorMessage: execution.errorMessage ?? null,
        stdoutTail: execution.stdoutTail ?? null,
        stderrTail: execution.stderrTail ?? null,
      });
    },

    finishRun(runId, completion): Run {
      db.prepare(
        `UPDATE pipeline_runs SET status = @status, finished_at = @finishedAt,
           duration_ms = @durationMs,
           failed_stage = @failedStage, error = @error
         WHERE id = @runId AND status IN ('pending', 'running')`,
      ).run({
        runId,
        status: completion.status,
        finishedAt: completion.finishedAt,
        durationMs: completion.durationMs,
        failedStage: completion.failedStage ?? null,
        error: completion.error ?? null,
      });
      return requireRun(runId);
    },

    getRun,

    listRuns(filter = {}): Run[] {
      const clauses: string[] = [];
      const params: Record<string, string | number> = {
        limit: filter.limit ?? 50,
      };
      if (filter.pipelineName !== undefined) {
        clauses.push('pipeline_name = @pipelineName');
        params.pipelineName = filter.pipelineName;
      }
      if (filter.since !== undefined) {
        clauses.push('trigger_time >= @since');
        params.since = filter.since;
      }
      if (filter.until !== undefined) {
        clauses.push('trigger_time < @until');
        params.until = filter.until;
      }
      if (filter.status !== undefined) {
        clauses.push('status = @status');
        params.status = filter.status;
      }
      const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

      const rows = db
        .prepare<[Record<string, string | number>], RunRow>(
          `SELECT ${RUN_COLUMNS} FROM pipeline_runs ${where}
           ORDER BY trigger_time DESC, id DESC LIMIT @limit`,
        )
        .all(params);
      return hydrate(rows);
    },

    lastRun(pipelineName): Run | null {
      const row = db
        .prepare<[string], RunRow>(
          `SELECT ${RUN_COLUMNS} FROM pipeline_runs WHERE pipeline_name = ?
           ORDER BY trigger_time DESC, id DESC LIMIT 1`,
        )
        .get(pipelineName);
      return row ? (hydrate([row])[0] ?? null) : null;
    },

    countByStatus(since): Record<RunStatus, number> {
      const counts: Record<RunStatus, number> = {
        pending: 0,
        running: 0,
        succeeded: 0,
        failed: 0,
      };
      const rows = db
        .prepare<[string], { status: string; count: number }>(
          `SELECT status, COUNT(*) as count FROM pipeline_runs
           WHERE trigger_time >= ? GROUP BY status`,
        )
        .all(since ?? '');
      for (const row of rows) {
        counts[runStatusSchema.parse(row.status)] = row.count;
      }
      return counts;
    },
  };
}
