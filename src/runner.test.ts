/**
 * Tests for the runner lifecycle and one-off pipeline execution.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { parseConfig } from './config/load.js';
import { closeConnection, createConnection } from './db/connection.js';
import { runMigrations } from './db/migrations.js';
import { HISTORY_MIGRATIONS } from './history/migrations.js';
import { createRunRepository } from './history/run-repository.js';
import { ConfigError, PipelineGraphError, PipelineNotFoundError } from './lib/errors.js';
import { compilePipelines, createRunner, runPipelineOnce } from './runner.js';
import type { ServiceConfig } from './schemas/config.js';

const logger = pino({ level: 'silent' });

describe('Runner', () => {
  let testDir: string;
  let config: ServiceConfig;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'telegram-pipeline-runner-'));
    config = parseConfig({
      port: 0,
      historyDbPath: join(testDir, 'history.sqlite'),
      log: { level: 'silent' },
      resources: {
        database: { path: join(testDir, 'warehouse.sqlite') },
        rawStorage: { dataDir: join(testDir, 'raw') },
      },
      pipelines: [
        {
          name: 'telegram_pipeline',
          stages: [
            {
              name: 'load',
              type: 'builtin',
              builtin: 'load-raw',
              resources: ['database', 'raw-storage'],
            },
          ],
        },
      ],
    });
  });

  afterEach(() => {
    rmSync(testDir, {
      recursive: true,
      force: true,
      maxRetries: 3,
      retryDelay: 100,
    });
  });

  it('should start, serve the API and stop cleanly', async () => {
    const runner = createRunner(config, { logger, handleSignals: false });

    await runner.start();
    const address = runner.address();
    expect(address).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);

    const health = await fetch(`${String(address)}/health`);
    expect(health.status).toBe(200);

    const trigger = await fetch(
      `${String(address)}/pipelines/telegram_pipeline/run`,
      { method: 'POST' },
    );
    expect(trigger.status).toBe(200);
    expect(await trigger.json()).toMatchObject({
      run: {
        status: 'succeeded',
        trigger: 'manual',
        stages: [{ stageName: 'load', status: 'succeeded' }],
      },
    });

    await runner.stop();
    expect(runner.address()).toBeNull();
    await expect(fetch(`${String(address)}/health`)).rejects.toThrow();
  });

  it('should fail runs left open by a previous process on start', async () => {
    const db = createConnection({ dbPath: config.historyDbPath });
    runMigrations(db, HISTORY_MIGRATIONS);
    const stale = createRunRepository(db).createRun(
      'telegram_pipeline',
      'schedule',
      '2024-01-15T00:00:00.000Z',
    );
    closeConnection(db);

    const runner = createRunner(config, { logger, handleSignals: false });
    await runner.start();
    await runner.stop();

    const reopened = createConnection({ dbPath: config.historyDbPath });
    try {
      expect(createRunRepository(reopened).getRun(stale.id)).toMatchObject({
        status: 'failed',
        error: 'Interrupted',
      });
    } finally {
      closeConnection(reopened);
    }
  });

  it('should refuse to start with an invalid pipeline graph', async () => {
    const runner = createRunner(
      {
        ...config,
        pipelines: parseConfig({
          pipelines: [
            {
              name: 'broken',
              stages: [
                { name: 'a', type: 'builtin', builtin: 'load-raw', dependsOn: ['b'] },
                { name: 'b', type: 'builtin', builtin: 'load-raw', dependsOn: ['a'] },
              ],
            },
          ],
        }).pipelines,
      },
      { logger, handleSignals: false },
    );

    await expect(runner.start()).rejects.toBeInstanceOf(PipelineGraphError);
    await runner.stop();
  });
});

describe('compilePipelines', () => {
  it('should reject duplicate pipeline names', () => {
    const { pipelines } = parseConfig({
      pipelines: [
        { name: 'twice', stages: [{ name: 'a', type: 'builtin', builtin: 'load-raw' }] },
        { name: 'twice', stages: [{ name: 'a', type: 'builtin', builtin: 'load-raw' }] },
      ],
    });

    expect(() => compilePipelines({ pipelines })).toThrow(
      new ConfigError('Duplicate pipeline name: twice'),
    );
  });
});

describe('runPipelineOnce', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), 'telegram-pipeline-once-'));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true, maxRetries: 3, retryDelay: 100 });
  });

  const onceConfig = (): ServiceConfig =>
    parseConfig({
      historyDbPath: join(testDir, 'history.sqlite'),
      pipelines: [
        {
          name: 'once',
          stages: [
            {
              name: 'noop',
              type: 'command',
              command: process.execPath,
              args: ['-e', 'process.exit(0)'],
            },
          ],
        },
      ],
    });

  it('should execute a pipeline and record the run', async () => {
    const config = onceConfig();

    const result = await runPipelineOnce(config, 'once', { logger });

    expect(result).toMatchObject({
      status: 'completed',
      run: { pipelineName: 'once', status: 'succeeded' },
    });
    await expect(runPipelineOnce(config, 'missing', { logger })).rejects.toBeInstanceOf(
      PipelineNotFoundError,
    );
  });

  it('should reject while another process has the pipeline running', async () => {
    const config = onceConfig();
    const db = createConnection({ dbPath: config.historyDbPath });
    runMigrations(db, HISTORY_MIGRATIONS);
    const runs = createRunRepository(db);
    const live = runs.createRun('once', 'schedule', '2024-01-15T00:00:00.000Z');
    runs.startRun(live.id, '2024-01-15T00:00:00.100Z');
    closeConnection(db);

    const result = await runPipelineOnce(config, 'once', { logger });

    expect(result).toEqual({ status: 'rejected', reason: 'overlap' });
    const reopened = createConnection({ dbPath: config.historyDbPath });
    try {
      expect(createRunRepository(reopened).listRuns({ pipelineName: 'once' })).toHaveLength(1);
    } finally {
      closeConnection(reopened);
    }
  });

  it('should run once the earlier run has finished', async () => {
    const config = onceConfig();
    const db = createConnection({ dbPath: config.historyDbPath });
    runMigrations(db, HISTORY_MIGRATIONS);
    const runs = createRunRepository(db);
    const earlier = runs.createRun('once', 'schedule', '2024-01-15T00:00:00.000Z');
    runs.finishRun(earlier.id, {
      status: 'succeeded',
      finishedAt: '2024-01-15T00:00:01.000Z',
      durationMs: 1000,
    });
    closeConnection(db);

    const result = await runPipelineOnce(config, 'once', { logger });

    expect(result).toMatchObject({ status: 'completed', run: { status: 'succeeded' } });
  });
});
