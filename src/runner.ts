/**
 * Main service orchestrator. Wires up the history and warehouse databases,
 * pipelines, scheduler and API server, and handles graceful shutdown on
 * SIGTERM/SIGINT.
 */

import { readFileSync } from 'node:fs';

import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';

import { createServer } from './api/server.js';
import { closeConnection, createConnection, type Db } from './db/connection.js';
import { runMigrations } from './db/migrations.js';
import {
  createMaintenance,
  type Maintenance,
  recoverInterruptedRuns,
} from './history/maintenance.js';
import { HISTORY_MIGRATIONS } from './history/migrations.js';
import { createRunRepository } from './history/run-repository.js';
import { ConfigError, PipelineNotFoundError } from './lib/errors.js';
import { createLogger } from './lib/logger.js';
import { createNotifier, type PostMessage } from './notify/slack.js';
import { createRunCoordinator } from './pipeline/coordinator.js';
import { createPipeline, type Pipeline } from './pipeline/pipeline.js';
import { createResourceProvider } from './pipeline/resources.js';
import {
  createScheduler,
  type Scheduler,
  type TriggerResult,
} from './scheduler/scheduler.js';
import type { ServiceConfig } from './schemas/config.js';
import { createStageFactory, type StageFactory } from './stages/registry.js';
import { WAREHOUSE_MIGRATIONS } from './warehouse/migrations.js';
import { createWarehouseRepository } from './warehouse/repository.js';

/** Optional overrides, mainly for tests. */
export interface RunnerDeps {
  logger?: Logger;
  createStage?: StageFactory;
  /** Slack transport override. */
  post?: PostMessage;
  /** Install SIGTERM/SIGINT handlers on start (default true). */
  handleSignals?: boolean;
}

/** Runner interface for managing the service lifecycle. */
export interface Runner {
  /** Open databases, schedule pipelines and start the API server. */
  start(): Promise<void>;
  /** Gracefully stop all components and release resources. */
  stop(): Promise<void>;
  /** Bound server address once started. */
  address(): string | null;
}

/**
 * Compile every configured pipeline. Graph and builtin errors surface here, at
 * startup, rather than on the first run.
 */
export function compilePipelines(
  config: Pick<ServiceConfig, 'pipelines'>,
  createStage: StageFactory = createStageFactory(),
): Pipeline[] {
  const names = new Set<string>();
  return config.pipelines.map((definition) => {
    if (names.has(definition.name)) {
      throw new ConfigError(`Duplicate pipeline name: ${definition.name}`);
    }
    names.add(definition.name);
    return createPipeline(definition, createStage);
  });
}

function readSlackToken(config: ServiceConfig): string | null {
  const path = config.notifications.slackTokenPath;
  if (!path) return null;
  try {
    return readFileSync(path, 'utf-8').trim();
  } catch (err) {
    throw new ConfigError(
      `Cannot read Slack token file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

function openHistory(config: ServiceConfig, logger: Logger): Db {
  const db = createConnection({ dbPath: config.historyDbPath });
  runMigrations(db, HISTORY_MIGRATIONS);
  logger.info({ dbPath: config.historyDbPath }, 'History database ready');
  return db;
}

/**
 * Create the runner. Nothing is opened until `start()`.
 */
export function createRunner(config: ServiceConfig, deps: RunnerDeps = {}): Runner {
  const logger = deps.logger ?? createLogger(config.log);

  let historyDb: Db | null = null;
  let warehouseDb: Db | null = null;
  let scheduler: Scheduler | null = null;
  let server: FastifyInstance | null = null;
  let maintenance: Maintenance | null = null;
  let address: string | null = null;
  const signalHandlers = new Map<NodeJS.Signals, () => void>();

  async function stop(): Promise<void> {
    logger.info('Stopping runner');

    for (const [signal, handler] of signalHandlers) process.off(signal, handler);
    signalHandlers.clear();

    if (maintenance) {
      maintenance.stop();
      maintenance = null;
    }

    if (scheduler) {
      await scheduler.stop();
      scheduler = null;
      logger.info('Scheduler stopped');
    }

    if (server) {
      await server.close();
      server = null;
      address = null;
      logger.info('API server stopped');
    }

    for (const db of [historyDb, warehouseDb]) {
      if (db) closeConnection(db);
    }
    historyDb = null;
    warehouseDb = null;
  }

  return {
    async start(): Promise<void> {
      logger.info('Starting runner');

      const pipelines = compilePipelines(config, deps.createStage);
      const notifier = createNotifier({
        slackToken: readSlackToken(config),
        logger,
        post: deps.post,
      });

      historyDb = openHistory(config, logger);
      recoverInterruptedRuns(historyDb, logger);
      const runs = createRunRepository(historyDb);

      maintenance = createMaintenance(historyDb, config, logger);
      maintenance.start();

      warehouseDb = createConnection({ dbPath: config.resources.database.path });
      runMigrations(warehouseDb, WAREHOUSE_MIGRATIONS);
      const warehouse = createWarehouseRepository(warehouseDb);

      const coordinator = createRunCoordinator({
        runs,
        resources: createResourceProvider(config.resources),
        logger,
      });

      scheduler = createScheduler({
        pipelines,
        coordinator,
        notifier,
        config,
        logger,
        runs,
      });
      scheduler.start();
      logger.info('Scheduler started');

      server = createServer(config, {
        pipelines,
        runs,
        scheduler,
        warehouse,
        channels: config.resources.platformApi.channels,
      });
      address = await server.listen({ port: config.port, host: config.host });
      logger.info({ address }, 'API server listening');

      if (deps.handleSignals ?? true) {
        for (const signal of ['SIGTERM', 'SIGINT'] as const) {
          const handler = (): void => {
            logger.info({ signal }, 'Received shutdown signal');
            stop().then(
              () => process.exit(0),
              (err: unknown) => {
                logger.error({ err }, 'Shutdown failed');
                process.exit(1);
              },
            );
          };
          signalHandlers.set(signal, handler);
          process.once(signal, handler);
        }
      }
    },

    stop,

    address: () => address,
  };
}

/**
 * Execute one pipeline to completion outside the scheduler. Used by the CLI's
 * `run` command. A `pending` or `running` row for the same pipeline in the
 * history database (another process mid-run) rejects the trigger.
 */
export async function runPipelineOnce(
  config: ServiceConfig,
  name: string,
  deps: Pick<RunnerDeps, 'logger' | 'createStage'> & { signal?: AbortSignal } = {},
): Promise<TriggerResult> {
  const logger = deps.logger ?? createLogger(config.log);
  const pipeline = compilePipelines(config, deps.createStage).find(
    (p) => p.definition.name === name,
  );
  if (!pipeline) throw new PipelineNotFoundError(name);

  const db = openHistory(config, logger);
  try {
    const runs = createRunRepository(db);
    const inFlight = (['pending', 'running'] as const).some(
      (status) => runs.listRuns({ pipelineName: name, status, limit: 1 }).length > 0,
    );
    if (inFlight) {
      logger.warn({ pipeline: name, trigger: 'manual' }, 'OverlapRejected');
      return { status: 'rejected', reason: 'overlap' };
    }

    const coordinator = createRunCoordinator({
      runs,
      resources: createResourceProvider(config.resources),
      logger,
    });
    const run = await coordinator.execute(pipeline, {
      trigger: 'manual',
      signal: deps.signal,
    });
    return { status: 'completed', run };
  } finally {
    closeConnection(db);
  }
}
