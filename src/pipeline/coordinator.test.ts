/**
 * Tests for the run coordinator.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createRunRepository, type RunRepository } from '../history/run-repository.js';
import { ConfigError } from '../lib/errors.js';
import { serviceConfigSchema } from '../schemas/config.js';
import type { PipelineDefinitionInput, StageDefinition } from '../schemas/pipeline.js';
import type { StagePayload } from '../schemas/run.js';
import { createTestDb, type TestDb } from '../test-utils/db.js';
import { pipelineDefinition } from '../test-utils/definitions.js';
import { createMockLogger } from '../test-utils/logger.js';
import { createRunCoordinator, type RunCoordinator } from './coordinator.js';
import { createPipeline, type Pipeline } from './pipeline.js';
import { createResourceProvider } from './resources.js';
import { createRetryPolicy, type RetryPolicy } from './retry-policy.js';
import {
  failure,
  skip,
  type StageContext,
  type StageReport,
  success,
} from './stage.js';

type Behavior = (
  input: StagePayload,
  context: StageContext,
) => StageReport | Promise<StageReport>;

const credentials = {
  apiId: '12345',
  apiHash: 'test-hash',
  phone: '+10000000000',
};

const TELEGRAM: PipelineDefinitionInput = {
  name: 'telegram_pipeline',
  stages: [
    { name: 'scrape', type: 'builtin', builtin: 'fake', resources: ['platform-api', 'raw-storage'] },
    { name: 'load', type: 'builtin', builtin: 'fake', resources: ['database', 'raw-storage'] },
    { name: 'transform', type: 'builtin', builtin: 'fake', resources: ['database'] },
    { name: 'enrich', type: 'builtin', builtin: 'fake', resources: ['database'], optional: true },
  ],
};

describe('createRunCoordinator', () => {
  let testDb: TestDb;
  let runs: RunRepository;
  let calls: string[];
  let sleep: ReturnType<typeof vi.fn>;

  beforeEach(() => {
    testDb = createTestDb();
    runs = createRunRepository(testDb.db);
    calls = [];
    sleep = vi.fn(() => Promise.resolve());
  });

  afterEach(() => {
    testDb.cleanup();
  });

  function coordinator(
    platformApi: object = credentials,
    overrides: {
      retryPolicy?: RetryPolicy;
      runs?: RunRepository;
      now?: () => Date;
    } = {},
  ): RunCoordinator {
    const config = serviceConfigSchema.parse({ resources: { platformApi } });
    return createRunCoordinator({
      runs: overrides.runs ?? runs,
      resources: createResourceProvider(config.resources),
      retryPolicy:
        overrides.retryPolicy ?? createRetryPolicy({ sleep, random: () => 0 }),
      logger: createMockLogger().logger,
      now: overrides.now,
    });
  }

  function pipeline(
    input: PipelineDefinitionInput,
    behaviors: Record<string, Behavior> = {},
  ): Pipeline {
    return createPipeline(pipelineDefinition(input), (definition: StageDefinition) => ({
      definition,
      run: async (stageInput, _resources, context) => {
        calls.push(definition.name);
        const behavior = behaviors[definition.name];
        return behavior
          ? behavior(stageInput, context)
          : { outcome: success({ stage: definition.name }) };
      },
    }));
  }

  it('times stages and runs with the injected clock', async () => {
    let ticks = 0;
    const now = (): Date => new Date(Date.UTC(2024, 0, 15) + 250 * ticks++);

    const run = await coordinator(credentials, { now }).execute(
      pipeline({
        name: 'clocked',
        stages: [{ name: 'scrape', type: 'builtin', builtin: 'fake' }],
      }),
      { trigger: 'manual' },
    );

    expect(run.triggerTime).toBe('2024-01-15T00:00:00.000Z');
    expect(run.stages[0]).toMatchObject({
      startedAt: '2024-01-15T00:00:00.500Z',
      endedAt: '2024-01-15T00:00:00.750Z',
      durationMs: 250,
    });
    expect(run.durationMs).toBe(750);
  });

  it('runs every stage in order and chains payloads', async () => {
    const run = await coordinator().execute(pipeline(TELEGRAM), {
      trigger: 'manual',
    });

    expect(run.status).toBe('succeeded');
    expect(run.trigger).toBe('manual');
    expect(run.failedStage).toBeUndefined();
    expect(calls).toEqual(['scrape', 'load', 'transform', 'enrich']);
    expect(run.stages.map((s) => [s.stageName, s.status, s.attemptCount])).toEqual([
      ['scrape', 'succeeded', 1],
      ['load', 'succeeded', 1],
      ['transform', 'succeeded', 1],
      ['enrich', 'succeeded', 1],
    ]);

    expect(run.stages[0]?.input).toEqual({
      status: 'success',
      timestamp: run.triggerTime,
    });
    for (let i = 1; i < run.stages.length; i += 1) {
      expect(run.stages[i]?.input).toEqual(run.stages[i - 1]?.output);
    }
    expect(run.stages[1]?.output).toMatchObject({
      status: 'success',
      data: { stage: 'load' },
    });

    expect(runs.getRun(run.id)).toEqual(run);
  });

  it('halts on a fatal failure without attempting later stages', async () => {
    const run = await coordinator().execute(
      pipeline(TELEGRAM, {
        scrape: () => ({ outcome: failure('fatal', 'invalid channel handle') }),
      }),
      { trigger: 'schedule' },
    );

    expect(run.status).toBe('failed');
    expect(run.failedStage).toBe('scrape');
    expect(run.error).toBe('invalid channel handle');
    expect(run.stages).toHaveLength(1);
    expect(run.stages[0]).toMatchObject({
      stageName: 'scrape',
      status: 'failed',
      attemptCount: 1,
      errorKind: 'fatal',
      errorMessage: 'invalid channel handle',
    });
    expect(calls).toEqual(['scrape']);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries a retryable stage with exponential backoff', async () => {
    let attempts = 0;
    const definition: PipelineDefinitionInput = {
      ...TELEGRAM,
      stages: TELEGRAM.stages.map((s) =>
        s.name === 'scrape' ? { ...s, retryable: true } : s,
      ),
    };

    const run = await coordinator().execute(
      pipeline(definition, {
        scrape: () => {
          attempts += 1;
          return attempts <= 2
            ? { outcome: failure('retryable', 'read ECONNRESET') }
            : { outcome: success({ files: 2 }) };
        },
      }),
      { trigger: 'manual' },
    );

    expect(run.status).toBe('succeeded');
    expect(run.stages[0]).toMatchObject({ status: 'succeeded', attemptCount: 3 });
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([5000, 10000]);
  });

  it('skips an optional stage whose resource is missing', async () => {
    const definition: PipelineDefinitionInput = {
      name: 'telegram_pipeline',
      stages: [
        { name: 'load', type: 'builtin', builtin: 'fake', resources: ['database'] },
        {
          name: 'enrich',
          type: 'builtin',
          builtin: 'fake',
          resources: ['platform-api'],
          optional: true,
        },
      ],
    };

    const run = await coordinator({}).execute(pipeline(definition), {
      trigger: 'manual',
    });

    expect(run.status).toBe('succeeded');
    expect(run.error).toBeUndefined();
    expect(run.stages[1]).toMatchObject({
      stageName: 'enrich',
      status: 'skipped',
      attemptCount: 0,
    });
    expect(run.stages[1]?.errorKind).toBeUndefined();
    expect(run.stages[1]?.errorMessage).toBeUndefined();
    expect(run.stages[1]?.output).toMatchObject({
      status: 'skipped',
      data: { reason: 'missing resource: platform-api' },
    });
    expect(calls).toEqual(['load']);
  });

  it('propagates a skip to downstream stages without invoking them', async () => {
    const run = await coordinator().execute(
      pipeline(TELEGRAM, {
        load: () => ({ outcome: skip('nothing new') }),
      }),
      { trigger: 'manual' },
    );

    expect(run.status).toBe('succeeded');
    expect(run.stages.map((s) => [s.stageName, s.status, s.attemptCount])).toEqual([
      ['scrape', 'succeeded', 1],
      ['load', 'skipped', 1],
      ['transform', 'skipped', 0],
      ['enrich', 'skipped', 0],
    ]);
    expect(run.stages[2]?.output?.data).toEqual({ reason: "upstream 'load' skipped" });
    expect(calls).toEqual(['scrape', 'load']);
  });

  it('throws ConfigError before creating a run when a required resource is missing', async () => {
    await expect(
      coordinator({}).execute(pipeline(TELEGRAM), { trigger: 'manual' }),
    ).rejects.toThrow(ConfigError);

    expect(runs.listRuns()).toEqual([]);
    expect(calls).toEqual([]);
  });

  it('stops before the next stage when cancelled', async () => {
    const controller = new AbortController();
    const retryPolicy = createRetryPolicy({ sleep });
    const cancelAfterFirst: RetryPolicy = {
      async execute(...args) {
        const result = await retryPolicy.execute(...args);
        controller.abort();
        return result;
      },
    };

    const run = await coordinator(credentials, { retryPolicy: cancelAfterFirst }).execute(
      pipeline(TELEGRAM),
      { trigger: 'manual', signal: controller.signal },
    );

    expect(run.status).toBe('failed');
    expect(run.failedStage).toBe('load');
    expect(run.error).toBe('Run cancelled');
    expect(run.stages.map((s) => [s.stageName, s.status])).toEqual([
      ['scrape', 'succeeded'],
    ]);
    expect(calls).toEqual(['scrape']);
  });

  it('fails at the entry stage when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const run = await coordinator().execute(pipeline(TELEGRAM), {
      trigger: 'manual',
      signal: controller.signal,
    });

    expect(run.status).toBe('failed');
    expect(run.failedStage).toBe('scrape');
    expect(run.stages).toEqual([]);
    expect(calls).toEqual([]);
  });

  it('fails the run when the pipeline timeout elapses', async () => {
    const run = await coordinator().execute(
      pipeline(
        { ...TELEGRAM, timeoutMs: 50 },
        {
          scrape: (_input, context) =>
            new Promise<StageReport>((resolve) => {
              context.signal.addEventListener('abort', () => {
                resolve({ outcome: failure('cancelled', 'aborted') });
              });
            }),
        },
      ),
      { trigger: 'schedule' },
    );

    expect(run.status).toBe('failed');
    expect(run.failedStage).toBe('scrape');
    expect(run.error).toBe('Run exceeded timeout of 50ms');
    expect(run.stages[0]?.errorKind).toBe('cancelled');
  });

  it('turns an unexpected exception into a failed run', async () => {
    const failingRuns: RunRepository = {
      ...runs,
      recordStage: () => {
        throw new Error('disk I/O error');
      },
    };

    const run = await coordinator(credentials, { runs: failingRuns }).execute(
      pipeline(TELEGRAM),
      { trigger: 'manual' },
    );

    expect(run.status).toBe('failed');
    expect(run.failedStage).toBe('scrape');
    expect(run.error).toBe('disk I/O error');
    expect(calls).toEqual(['scrape']);
  });

  it('converts a stage that throws into a failed stage execution', async () => {
    const definition = pipelineDefinition({
      name: 'telegram_pipeline',
      stages: [{ name: 'load', type: 'builtin', builtin: 'fake' }],
    });
    const broken = createPipeline(definition, (stageDefinition) => ({
      definition: stageDefinition,
      run: () => {
        throw new Error('stage crashed');
      },
    }));

    const run = await coordinator().execute(broken, { trigger: 'manual' });

    expect(run.status).toBe('failed');
    expect(run.failedStage).toBe('load');
    expect(run.error).toBe('stage crashed');
    expect(run.stages[0]).toMatchObject({ status: 'failed', errorKind: 'fatal' });
  });

  it('passes data keyed by upstream name to a stage with several upstreams', async () => {
    let received: StagePayload | undefined;
    const definition: PipelineDefinitionInput = {
      name: 'fan_in',
      stages: [
        { name: 'a', type: 'builtin', builtin: 'fake' },
        { name: 'b', type: 'builtin', builtin: 'fake', dependsOn: ['a'] },
        { name: 'c', type: 'builtin', builtin: 'fake', dependsOn: ['a'] },
        { name: 'd', type: 'builtin', builtin: 'fake', dependsOn: ['b', 'c'] },
      ],
    };

    const run = await coordinator().execute(
      pipeline(definition, {
        d: (input) => {
          received = input;
          return { outcome: success() };
        },
      }),
      { trigger: 'manual' },
    );

    expect(run.status).toBe('succeeded');
    expect(received?.data).toEqual({ b: { stage: 'b' }, c: { stage: 'c' } });
  });

  it('reports the created run before the first stage starts', async () => {
    const onRunCreated = vi.fn();

    const run = await coordinator().execute(pipeline(TELEGRAM), {
      trigger: 'manual',
      onRunCreated,
    });

    expect(onRunCreated).toHaveBeenCalledWith(
      expect.objectContaining({ id: run.id, status: 'pending' }),
    );
  });
});
