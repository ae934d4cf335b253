/**
 * Cron registry. One croner instance per enabled pipeline, evaluated in the
 * pipeline's timezone. Schedules that croner rejects are tracked as failed
 * registrations instead of aborting startup.
 */

import { Cron } from 'croner';
import type { Logger } from 'pino';

import type { Pipeline } from '../pipeline/pipeline.js';

export interface CronRegistryDeps {
  logger: Logger;
  /** Called on every tick; must not throw. */
  onScheduledRun: (pipeline: Pipeline) => void;
}

/** Outcome of a registration pass. */
export interface RegistrationSummary {
  totalEnabled: number;
  failedNames: string[];
}

export interface CronRegistry {
  /** Replace all registrations with crons for the enabled pipelines. */
  register(pipelines: readonly Pipeline[]): RegistrationSummary;
  stopAll(): void;
  getFailedRegistrations(): string[];
  /** Next scheduled fire time of a pipeline, or null when unscheduled. */
  nextRun(pipelineName: string): Date | null;
}

export function createCronRegistry(deps: CronRegistryDeps): CronRegistry {
  const { logger, onScheduledRun } = deps;
  const crons = new Map<string, Cron>();
  let failed: string[] = [];

  function stopAll(): void {
    for (const cron of crons.values()) cron.stop();
    crons.clear();
  }

  return {
    register(pipelines): RegistrationSummary {
      stopAll();
      failed = [];

      const enabled = pipelines.filter((p) => p.definition.enabled);
      for (const pipeline of enabled) {
        const { name, schedule, timezone } = pipeline.definition;
        try {
          const cron = new Cron(schedule, { name, timezone }, () => {
            onScheduledRun(pipeline);
          });
          crons.set(name, cron);
          logger.info({ pipeline: name, schedule, timezone }, 'Scheduled pipeline');
        } catch (err) {
          failed.push(name);
          logger.error(
            { pipeline: name, schedule, timezone, err },
            'Failed to register pipeline schedule',
          );
        }
      }

      return { totalEnabled: enabled.length, failedNames: [...failed] };
    },

    stopAll,

    getFailedRegistrations(): string[] {
      return [...failed];
    },

    nextRun(pipelineName): Date | null {
      return crons.get(pipelineName)?.nextRun() ?? null;
    },
  };
}
