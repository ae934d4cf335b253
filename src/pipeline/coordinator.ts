/**
 * Run coordinator. Executes one pipeline graph for one trigger: snapshots
 * resources, walks the topological order, hands each stage its upstream's
 * payload, and persists every stage execution as it resolves.
 *
 * @module
 */

import type { Logger } from 'pino';

import type { RunRepository } from '../history/run-repository.js';
import type {
  Run,
  RunTrigger,
  StageExecution,
  StagePayload,
  StageStatus,
} from '../schemas/run.js';
import type { Pipeline } from './pipeline.js';
import type { ResourceProvider } from './resources.js';
import { createRetryPolicy, type RetryPolicy } from './retry-policy.js';
import { type StageOutcome, toPayload } from './stage.js';

export interface RunCoordinatorDeps {
  runs: RunRepository;
  resources: ResourceProvider;
  logger: Logger;
  /** Defaults to a retry policy over the real stage runner. */
  retryPolicy?: RetryPolicy;
  now?: () => Date;
}

export interface ExecuteOptions {
  trigger: RunTrigger;
  /** Aborting cancels the run before its next stage and interrupts the current one. */
  signal?: AbortSignal;
  /** Called once the run row exists, before the first stage starts. */
  onRunCreated?: (run: Run) => void;
}

export interface RunCoordinator {
  /**
   * Execute a pipeline. Throws ConfigError, before any run is created, when a
   * non-optional stage's resource is unavailable; otherwise resolves with the
   * terminal run.
   */
  execute(pipeline: Pipeline, options: ExecuteOptions): Promise<Run>;
}

const STATUS_BY_OUTCOME: Record<StageOutcome['kind'], StageStatus> = {
  success: 'succeeded',
  skip: 'skipped',
  failure: 'failed',
};

/** Create a run coordinator. */
export function createRunCoordinator(deps: RunCoordinatorDeps): RunCoordinator {
  const { runs, resources, logger } = deps;
  const retryPolicy = deps.retryPolicy ?? createRetryPolicy();
  const now = deps.now ?? (() => new Date());
  const iso = (): string => now().toISOString();

  return {
    async execute(pipeline, options): Promise<Run> {
      const { definition, graph } = pipeline;
      const snapshot = resources.snapshot();
      snapshot.validate(definition.name, definition.stages);

      const triggerTime = iso();
      const run = runs.createRun(definition.name, options.trigger, triggerTime);
      options.onRunCreated?.(run);

      const log = logger.child({ pipeline: definition.name, runId: run.id });
      const startedAt = now();
      runs.startRun(run.id, startedAt.toISOString());
      log.info({ trigger: options.trigger }, 'Run started');

      const controller = new AbortController();
      const onCancel = (): void => controller.abort();
      if (options.signal?.aborted) controller.abort();
      options.signal?.addEventListener('abort', onCancel, { once: true });

      let timedOut = false;
      const timeoutHandle =
        definition.timeoutMs === undefined
          ? null
          : setTimeout(() => {
              timedOut = true;
              controller.abort();
            }, definition.timeoutMs);

      const cancelMessage = (): string =>
        timedOut
          ? `Run exceeded timeout of ${String(definition.timeoutMs)}ms`
          : 'Run cancelled';

      const outputs = new Map<string, StagePayload>();
      const statuses = new Map<string, StageStatus>();
      let failedStage: string | undefined;
      let error: string | undefined;
      let current: string | undefined;

      const record = (execution: StageExecution): void => {
        runs.recordStage(run.id, execution);
        statuses.set(execution.stageName, execution.status);
        if (execution.output) outputs.set(execution.stageName, execution.output);
      };

      const inputFor = (name: string): StagePayload => {
        const upstream = graph.upstreamOf(name);
        if (upstream.length === 0) {
          return { status: 'success', timestamp: triggerTime };
        }
        if (upstream.length === 1) {
          const payload = outputs.get(upstream[0]);
          if (payload) return payload;
        }
        return {
          status: 'success',
          timestamp: iso(),
          data: Object.fromEntries(
            upstream.map((u) => [u, outputs.get(u)?.data ?? null]),
          ),
        };
      };

      try {
        for (const name of graph.topologicalOrder()) {
          current = name;
          const stage = pipeline.stage(name);
          const stageDef = stage.definition;

          if (controller.signal.aborted) {
            failedStage = name;
            error = cancelMessage();
            log.warn({ stage: name }, error);
            break;
          }

          const input = inputFor(name);

          const skippedUpstream = graph
            .upstreamOf(name)
            .find((u) => statuses.get(u) === 'skipped');
          if (skippedUpstream !== undefined) {
            const timestamp = iso();
            record({
              stageName: name,
              attemptCount: 0,
              status: 'skipped',
              startedAt: timestamp,
              endedAt: timestamp,
              durationMs: 0,
              input,
              output: toPayload(
                { kind: 'skip', reason: `upstream '${skippedUpstream}' skipped` },
                timestamp,
              ),
            });
            log.info({ stage: name, upstream: skippedUpstream }, 'Stage skipped');
            continue;
          }

          const resolved = snapshot.resolve(stageDef);
          if (!resolved.ok) {
            const reason = `missing resource: ${resolved.missing.join(', ')}`;
            const timestamp = iso();
            const outcome: StageOutcome = stageDef.optional
              ? { kind: 'skip', reason }
              : { kind: 'failure', failure: 'fatal', message: reason };
            record({
              stageName: name,
              attemptCount: 0,
              status: STATUS_BY_OUTCOME[outcome.kind],
              startedAt: timestamp,
              endedAt: timestamp,
              durationMs: 0,
              input,
              output: toPayload(outcome, timestamp),
              ...(outcome.kind === 'failure'
                ? { errorKind: outcome.failure, errorMessage: outcome.message }
                : {}),
            });
            if (outcome.kind === 'failure') {
              failedStage = name;
              error = outcome.message;
              break;
            }
            log.info({ stage: name, reason }, 'Stage skipped');
            continue;
          }

          const stageStart = now();
          log.info({ stage: name }, 'Stage started');
          const { result, attempts } = await retryPolicy.execute(
            stage,
            input,
            resolved.bundle,
            {
              timeoutMs: stageDef.timeoutMs,
              signal: controller.signal,
              pipelineName: definition.name,
              runId: run.id,
              logger: log.child({ stage: name }),
            },
          );
          const { outcome } = result;
          const stageEnd = now();

          record({
            stageName: name,
            attemptCount: attempts,
            status: STATUS_BY_OUTCOME[outcome.kind],
            startedAt: stageStart.toISOString(),
            endedAt: stageEnd.toISOString(),
            durationMs: stageEnd.getTime() - stageStart.getTime(),
            input,
            output: toPayload(outcome, result.timestamp),
            ...(outcome.kind === 'failure'
              ? { errorKind: outcome.failure, errorMessage: outcome.message }
              : {}),
            stdoutTail: result.stdoutTail || undefined,
            stderrTail: result.stderrTail || undefined,
          });

          if (outcome.kind === 'failure') {
            failedStage = name;
            error =
              outcome.failure === 'cancelled' ? cancelMessage() : outcome.message;
            log.error(
              { stage: name, kind: outcome.failure, attempts, error },
              'Stage failed',
            );
            break;
          }
          log.info(
            { stage: name, status: STATUS_BY_OUTCOME[outcome.kind], attempts },
            'Stage finished',
          );
        }
      } catch (err) {
        failedStage = current;
        error = err instanceof Error ? err.message : String(err);
        log.error({ err, stage: current }, 'Run aborted by unexpected error');
      } finally {
        if (timeoutHandle) clearTimeout(timeoutHandle);
        options.signal?.removeEventListener('abort', onCancel);
      }

      const finishedAt = now();
      const finished = runs.finishRun(run.id, {
        status: error === undefined ? 'succeeded' : 'failed',
        finishedAt: finishedAt.toISOString(),
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        failedStage,
        error,
      });
      log.info(
        { status: finished.status, durationMs: finished.durationMs, failedStage },
        'Run finished',
      );
      return finished;
    },
  };
}
