/**
 * Tests for run history maintenance.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createTestDb, type TestDb } from '../test-utils/db.js';
import { createMockLogger } from '../test-utils/logger.js';
import {
  createMaintenance,
  pruneOldRuns,
  recoverInterruptedRuns,
} from './maintenance.js';
import { createRunRepository, type RunRepository } from './run-repository.js';

const NOW = new Date('2024-02-01T00:00:00.000Z');

describe('maintenance', () => {
  let testDb: TestDb;
  let runs: RunRepository;

  beforeEach(() => {
    testDb = createTestDb();
    runs = createRunRepository(testDb.db);
  });

  afterEach(() => {
    vi.useRealTimers();
    testDb.cleanup();
  });

  function finished(triggerTime: string): number {
    const { id } = runs.createRun('telegram_pipeline', 'schedule', triggerTime);
    runs.finishRun(id, { status: 'succeeded', finishedAt: triggerTime, durationMs: 1 });
    return id;
  }

  const stageCount = (): number =>
    testDb.db
      .prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM stage_executions')
      .get()?.count ?? 0;

  describe('pruneOldRuns', () => {
    it('should delete finished runs past retention along with their stages', () => {
      const old = finished('2023-12-01T00:00:00.000Z');
      runs.recordStage(old, { stageName: 'scrape', attemptCount: 1, status: 'succeeded' });
      const recent = finished('2024-01-20T00:00:00.000Z');
      const { mock, logger } = createMockLogger();

      expect(pruneOldRuns(testDb.db, 30, logger, NOW)).toBe(1);

      expect(runs.getRun(old)).toBeNull();
      expect(runs.getRun(recent)).not.toBeNull();
      expect(stageCount()).toBe(0);
      expect(mock.info).toHaveBeenCalledWith(
        { deleted: 1, cutoff: '2024-01-02T00:00:00.000Z' },
        'Pruned old runs',
      );
    });

    it('should keep old runs that never finished', () => {
      const { id } = runs.createRun('telegram_pipeline', 'schedule', '2023-12-01T00:00:00.000Z');

      expect(pruneOldRuns(testDb.db, 30, createMockLogger().logger, NOW)).toBe(0);
      expect(runs.getRun(id)?.status).toBe('pending');
    });
  });

  describe('recoverInterruptedRuns', () => {
    it('should fail pending and running runs', () => {
      const pending = runs.createRun('telegram_pipeline', 'schedule', '2024-01-31T00:00:00.000Z');
      const running = runs.createRun('telegram_pipeline', 'manual', '2024-01-31T01:00:00.000Z');
      runs.startRun(running.id, '2024-01-31T01:00:00.000Z');
      const done = finished('2024-01-30T00:00:00.000Z');
      const { mock, logger } = createMockLogger();

      expect(recoverInterruptedRuns(testDb.db, logger, NOW)).toBe(2);

      expect(runs.getRun(pending.id)).toMatchObject({
        status: 'failed',
        error: 'Interrupted',
        finishedAt: '2024-02-01T00:00:00.000Z',
      });
      expect(runs.getRun(running.id)?.status).toBe('failed');
      expect(runs.getRun(done)?.status).toBe('succeeded');
      expect(mock.warn).toHaveBeenCalledWith(
        { recovered: 2 },
        'Marked interrupted runs as failed',
      );
    });
  });

  describe('createMaintenance', () => {
    it('should prune on start and again on each interval', () => {
      vi.useFakeTimers();
      vi.setSystemTime(NOW);

      const first = finished('2023-11-01T00:00:00.000Z');
      const maintenance = createMaintenance(
        testDb.db,
        { runRetentionDays: 30, maintenanceIntervalMs: 60_000 },
        createMockLogger().logger,
      );

      maintenance.start();
      expect(runs.getRun(first)).toBeNull();

      const second = finished('2023-11-02T00:00:00.000Z');
      vi.advanceTimersByTime(60_000);
      expect(runs.getRun(second)).toBeNull();

      maintenance.stop();
      const third = finished('2023-11-03T00:00:00.000Z');
      vi.advanceTimersByTime(120_000);
      expect(runs.getRun(third)).not.toBeNull();

      maintenance.runNow();
      expect(runs.getRun(third)).toBeNull();
    });
  });
});
