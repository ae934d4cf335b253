/**
 * Run history maintenance: retention pruning and recovery of runs left open by
 * a crashed process.
 */

import type { Logger } from 'pino';

import type { Db } from '../db/connection.js';

/** Configuration for maintenance tasks. */
export interface MaintenanceConfig {
  /** Number of days to retain completed run records before pruning. */
  runRetentionDays: number;
  /** Interval in milliseconds between maintenance task runs. */
  maintenanceIntervalMs: number;
}

/** Maintenance controller with start/stop lifecycle. */
export interface Maintenance {
  /** Start maintenance tasks (runs immediately, then on interval). */
  start(): void;
  /** Stop maintenance task interval. */
  stop(): void;
  /** Run all maintenance tasks immediately. */
  runNow(): void;
}

/** Delete terminal runs triggered before the retention cutoff. Stage rows cascade. */
export function pruneOldRuns(
  db: Db,
  days: number,
  logger: Logger,
  now: Date = new Date(),
): number {
  const cutoff = new Date(now.getTime() - days * 86_400_000).toISOString();
  const result = db
    .prepare<[string]>(
      `DELETE FROM pipeline_runs
       WHERE trigger_time < ? AND status IN ('succeeded', 'failed')`,
    )
    .run(cutoff);
  if (result.changes > 0) {
    logger.info({ deleted: result.changes, cutoff }, 'Pruned old runs');
  }
  return result.changes;
}

/**
 * Fail runs still `pending` or `running` from a previous process. Call once at
 * startup, before the scheduler registers any pipeline.
 */
export function recoverInterruptedRuns(
  db: Db,
  logger: Logger,
  now: Date = new Date(),
): number {
  const result = db
    .prepare<[string]>(
      `UPDATE pipeline_runs
       SET status = 'failed', finished_at = ?, error = 'Interrupted'
       WHERE status IN ('pending', 'running')`,
    )
    .run(now.toISOString());
  if (result.changes > 0) {
    logger.warn({ recovered: result.changes }, 'Marked interrupted runs as failed');
  }
  return result.changes;
}

/**
 * Create the maintenance controller. Prunes on startup and at the configured
 * interval.
 */
export function createMaintenance(
  db: Db,
  config: MaintenanceConfig,
  logger: Logger,
): Maintenance {
  let interval: NodeJS.Timeout | null = null;

  function runAll(): void {
    pruneOldRuns(db, config.runRetentionDays, logger);
  }

  return {
    start(): void {
      runAll();
      interval = setInterval(runAll, config.maintenanceIntervalMs);
      interval.unref();
    },

    stop(): void {
      if (interval) {
        clearInterval(interval);
        interval = null;
      }
    },

    runNow(): void {
      runAll();
    },
  };
}
