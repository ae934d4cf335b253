/**
 * Croner-based pipeline scheduler. Registers enabled pipelines, runs them
 * through the run coordinator, rejects overlapping runs of the same pipeline,
 * and dispatches notifications when runs finish.
 */

import type { Logger } from 'pino';

import type { RunRepository } from '../history/run-repository.js';
import { PipelineNotFoundError } from '../lib/errors.js';
import type { Notifier } from '../notify/slack.js';
import type { RunCoordinator } from '../pipeline/coordinator.js';
import type { Pipeline } from '../pipeline/pipeline.js';
import type { ServiceConfig } from '../schemas/config.js';
import type { Run, RunTrigger } from '../schemas/run.js';
import { createCronRegistry } from './cron-registry.js';
import { dispatchNotification } from './notification-helper.js';

/** Scheduler dependencies. */
export interface SchedulerDeps {
  /** Compiled pipelines. */
  pipelines: readonly Pipeline[];
  coordinator: RunCoordinator;
  /** Notification service for run completion events. */
  notifier: Notifier;
  config: Pick<ServiceConfig, 'shutdownGraceMs' | 'notifications'>;
  logger: Logger;
  /** Run history, read for the current state of in-flight runs. */
  runs?: Pick<RunRepository, 'getRun'>;
}

/** Result of a trigger. Overlap is a value, not an error. */
export type TriggerResult =
  | { status: 'completed'; run: Run }
  | { status: 'rejected'; reason: 'overlap' };

/** Scheduler interface for managing pipeline schedules and execution. */
export interface Scheduler {
  /** Register crons for all enabled pipelines. */
  start(): void;
  /**
   * Stop crons, wait up to the shutdown grace period for in-flight runs, then
   * cancel whatever is still running.
   */
  stop(): Promise<void>;
  /**
   * Run a pipeline now and wait for the run to finish. Throws
   * PipelineNotFoundError for unknown pipelines and ConfigError when resources
   * are missing.
   */
  triggerPipeline(name: string): Promise<TriggerResult>;
  /** Abort the in-flight run of a pipeline. Returns false if none is running. */
  cancelPipeline(name: string): boolean;
  /** Names of pipelines with an in-flight run. */
  getRunningPipelines(): string[];
  /**
   * In-flight run of a pipeline, once its record exists, as currently stored in
   * the run history.
   */
  getActiveRun(name: string): Run | null;
  /** Names of pipelines whose schedules failed to register. */
  getFailedRegistrations(): string[];
  nextRun(name: string): Date | null;
}

interface ActiveRun {
  controller: AbortController;
  run: Run | null;
  done: Promise<unknown>;
}

/** Create the pipeline scheduler. */
export function createScheduler(deps: SchedulerDeps): Scheduler {
  const { pipelines, coordinator, notifier, config, logger, runs } = deps;
  const byName = new Map(pipelines.map((p) => [p.definition.name, p]));
  const active = new Map<string, ActiveRun>();

  const cronRegistry = createCronRegistry({
    logger,
    onScheduledRun: (pipeline) => {
      void onScheduledRun(pipeline);
    },
  });

  function lookup(name: string): Pipeline {
    const pipeline = byName.get(name);
    if (!pipeline) throw new PipelineNotFoundError(name);
    return pipeline;
  }

  /**
   * Run a pipeline unless one is already in flight. The active check and the
   * registration happen before the first await.
   */
  function runPipeline(
    pipeline: Pipeline,
    trigger: RunTrigger,
  ): Promise<TriggerResult> {
    const { name, onSuccess, onFailure } = pipeline.definition;

    if (active.has(name)) {
      logger.warn({ pipeline: name, trigger }, 'OverlapRejected');
      return Promise.resolve({ status: 'rejected', reason: 'overlap' });
    }

    const entry: ActiveRun = {
      controller: new AbortController(),
      run: null,
      done: Promise.resolve(),
    };
    active.set(name, entry);

    const execution = (async (): Promise<TriggerResult> => {
      try {
        const run = await coordinator.execute(pipeline, {
          trigger,
          signal: entry.controller.signal,
          onRunCreated: (created) => {
            entry.run = created;
          },
        });
        await dispatchNotification(
          run,
          onSuccess ?? config.notifications.defaultOnSuccess,
          onFailure ?? config.notifications.defaultOnFailure,
          notifier,
          logger,
        );
        return { status: 'completed', run };
      } finally {
        active.delete(name);
      }
    })();
    entry.done = execution.catch(() => undefined);
    return execution;
  }

  async function onScheduledRun(pipeline: Pipeline): Promise<void> {
    const { name } = pipeline.definition;
    await runPipeline(pipeline, 'schedule').catch((err: unknown) => {
      logger.error({ pipeline: name, err }, 'Scheduled run failed to start');
    });
  }

  return {
    start(): void {
      const { totalEnabled, failedNames } = cronRegistry.register(pipelines);

      logger.info({ count: totalEnabled }, 'Loading pipelines');

      if (failedNames.length > 0) {
        const ok = totalEnabled - failedNames.length;
        logger.warn(
          { failed: failedNames.length, total: totalEnabled },
          `${String(failedNames.length)} of ${String(totalEnabled)} pipelines failed to register`,
        );
        const message = `⚠️ telegram-pipeline started: ${String(ok)}/${String(totalEnabled)} pipelines scheduled, ${String(failedNames.length)} failed: ${failedNames.join(', ')}`;
        const channel = config.notifications.defaultOnFailure;
        if (channel) {
          notifier
            .notifyFailure('telegram-pipeline', 0, message, channel)
            .catch((err: unknown) => {
              logger.error({ err }, 'Registration failure notification failed');
            });
        }
      }
    },

    async stop(): Promise<void> {
      logger.info('Stopping scheduler');
      cronRegistry.stopAll();

      const inFlight = (): Promise<unknown> =>
        Promise.all([...active.values()].map((a) => a.done));

      if (active.size > 0) {
        let graceHandle: NodeJS.Timeout | undefined;
        const grace = new Promise<void>((resolve) => {
          graceHandle = setTimeout(resolve, config.shutdownGraceMs);
        });
        await Promise.race([inFlight(), grace]);
        clearTimeout(graceHandle);
      }

      if (active.size > 0) {
        logger.warn(
          { count: active.size, pipelines: [...active.keys()] },
          'Cancelling runs still in flight',
        );
        for (const entry of active.values()) entry.controller.abort();
        await inFlight();
      }
    },

    async triggerPipeline(name): Promise<TriggerResult> {
      return runPipeline(lookup(name), 'manual');
    },

    cancelPipeline(name): boolean {
      lookup(name);
      const entry = active.get(name);
      if (!entry) return false;
      logger.info({ pipeline: name, runId: entry.run?.id }, 'Cancelling run');
      entry.controller.abort();
      return true;
    },

    getRunningPipelines(): string[] {
      return [...active.keys()];
    },

    getActiveRun(name): Run | null {
      const created = active.get(name)?.run;
      if (!created) return null;
      return runs?.getRun(created.id) ?? created;
    },

    getFailedRegistrations(): string[] {
      return cronRegistry.getFailedRegistrations();
    },

    nextRun(name): Date | null {
      return cronRegistry.nextRun(name);
    },
  };
}
