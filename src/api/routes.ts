/**
 * Fastify API routes for pipeline operations and monitoring: pipeline
 * listing, run history, manual triggers, cancellation and stats.
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';

import type { RunRepository } from '../history/run-repository.js';
import { ConfigError, PipelineNotFoundError } from '../lib/errors.js';
import type { Pipeline } from '../pipeline/pipeline.js';
import type { Scheduler } from '../scheduler/scheduler.js';
import { type Run, runStatusSchema } from '../schemas/run.js';

/** Route dependencies. */
export interface RouteDeps {
  pipelines: readonly Pipeline[];
  runs: RunRepository;
  scheduler: Scheduler;
}

const runsQuerySchema = z.object({
  since: z.string().datetime({ offset: true }).optional(),
  until: z.string().datetime({ offset: true }).optional(),
  status: runStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(500).default(50),
});

const runParamsSchema = z.object({ id: z.coerce.number().int().positive() });

/** Short form of a run for listings. */
function summarize(run: Run | null) {
  if (!run) return null;
  const { id, status, trigger, triggerTime, finishedAt, durationMs, failedStage } =
    run;
  return { id, status, trigger, triggerTime, finishedAt, durationMs, failedStage };
}

/**
 * Register all pipeline API routes on the Fastify instance.
 */
export function registerRoutes(app: FastifyInstance, deps: RouteDeps): void {
  const { pipelines, runs, scheduler } = deps;
  const byName = new Map(pipelines.map((p) => [p.definition.name, p]));

  function describe(pipeline: Pipeline) {
    const { name, description, schedule, timezone, enabled } = pipeline.definition;
    return {
      name,
      description,
      schedule,
      timezone,
      enabled,
      stages: pipeline.graph.topologicalOrder(),
      running: scheduler.getRunningPipelines().includes(name),
      nextRun: scheduler.nextRun(name)?.toISOString() ?? null,
      lastRun: summarize(runs.lastRun(name)),
    };
  }

  /** GET /health: Health check. */
  app.get('/health', () => {
    return { ok: true, uptime: process.uptime() };
  });

  /** GET /pipelines: List pipelines with schedule and last run. */
  app.get('/pipelines', () => {
    return { pipelines: pipelines.map(describe) };
  });

  /** GET /pipelines/:name: Pipeline detail including stage definitions. */
  app.get<{ Params: { name: string } }>(
    '/pipelines/:name',
    (request, reply) => {
      const pipeline = byName.get(request.params.name);
      if (!pipeline) {
        reply.code(404);
        return { error: 'Pipeline not found' };
      }
      return {
        pipeline: {
          ...describe(pipeline),
          definition: pipeline.definition,
          activeRun: summarize(scheduler.getActiveRun(pipeline.definition.name)),
        },
      };
    },
  );

  /** GET /pipelines/:name/runs: Run history for a pipeline. */
  app.get<{ Params: { name: string }; Querystring: Record<string, string> }>(
    '/pipelines/:name/runs',
    (request, reply) => {
      if (!byName.has(request.params.name)) {
        reply.code(404);
        return { error: 'Pipeline not found' };
      }
      const query = runsQuerySchema.safeParse(request.query);
      if (!query.success) {
        reply.code(400);
        return { error: query.error.issues.map((i) => i.message).join('; ') };
      }
      return {
        runs: runs.listRuns({ pipelineName: request.params.name, ...query.data }),
      };
    },
  );

  /** GET /runs/:id: Single run with its stage executions. */
  app.get<{ Params: { id: string } }>('/runs/:id', (request, reply) => {
    const params = runParamsSchema.safeParse(request.params);
    const run = params.success ? runs.getRun(params.data.id) : null;
    if (!run) {
      reply.code(404);
      return { error: 'Run not found' };
    }
    return { run };
  });

  /** POST /pipelines/:name/run: Trigger a manual run and wait for it. */
  app.post<{ Params: { name: string } }>(
    '/pipelines/:name/run',
    async (request, reply) => {
      try {
        const result = await scheduler.triggerPipeline(request.params.name);
        if (result.status === 'rejected') {
          reply.code(409);
          return { error: 'Pipeline is already running', reason: result.reason };
        }
        return { run: result.run };
      } catch (err) {
        if (err instanceof PipelineNotFoundError) {
          reply.code(404);
          return { error: 'Pipeline not found' };
        }
        if (err instanceof ConfigError) {
          request.log.error({ err }, 'Pipeline cannot start');
          reply.code(500);
          return { error: err.message };
        }
        throw err;
      }
    },
  );

  /** POST /pipelines/:name/cancel: Cancel the in-flight run. */
  app.post<{ Params: { name: string } }>(
    '/pipelines/:name/cancel',
    (request, reply) => {
      if (!byName.has(request.params.name)) {
        reply.code(404);
        return { error: 'Pipeline not found' };
      }
      return { cancelled: scheduler.cancelPipeline(request.params.name) };
    },
  );

  /** GET /stats: Aggregate run statistics. */
  app.get('/stats', () => {
    const lastHour = runs.countByStatus(
      new Date(Date.now() - 3_600_000).toISOString(),
    );
    return {
      totalPipelines: pipelines.length,
      running: scheduler.getRunningPipelines().length,
      failedRegistrations: scheduler.getFailedRegistrations(),
      runs: runs.countByStatus(),
      succeededLastHour: lastHour.succeeded,
      failedLastHour: lastHour.failed,
    };
  });
}
