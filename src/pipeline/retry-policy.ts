/**
 * Retry policy. Wraps the stage runner with bounded, jittered exponential
 * backoff for stages that opted into retries.
 *
 * @module
 */

import { setTimeout as delay } from 'node:timers/promises';

import type { Logger } from 'pino';

import type { RetrySettings } from '../schemas/pipeline.js';
import type { StagePayload } from '../schemas/run.js';
import type { ResourceBundle } from './resources.js';
import { failure, type Stage, type StageOutcome } from './stage.js';
import {
  runStage,
  type RunStage,
  type StageResult,
  type StageRunOptions,
} from './stage-runner.js';

/** In-flight retry bookkeeping; discarded once the stage resolves. */
export interface RetryState {
  attemptNumber: number;
  lastError: string;
  nextDelayMs: number;
}

/** Final result of a stage after retries. */
export interface RetriedResult {
  result: StageResult;
  attempts: number;
}

/** Retry policy dependencies; all optional. */
export interface RetryPolicyDeps {
  /** Stage runner (defaults to {@link runStage}). */
  run?: RunStage;
  /** Abortable sleep used between attempts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Random source in [0, 1) used for jitter. */
  random?: () => number;
}

export interface RetryPolicy {
  execute(
    stage: Stage,
    input: StagePayload,
    resources: ResourceBundle,
    options: StageRunOptions,
  ): Promise<RetriedResult>;
}

/**
 * Backoff before retry number `retry` (0-based): `baseDelayMs * 2^retry`,
 * stretched by up to `jitter` and capped at `maxDelayMs`. Never shorter than
 * the un-jittered delay.
 */
export function backoffDelay(
  retry: number,
  settings: Pick<RetrySettings, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>,
  random: () => number = Math.random,
): number {
  const raw = Math.min(settings.maxDelayMs, settings.baseDelayMs * 2 ** retry);
  const jittered = raw * (1 + settings.jitter * random());
  return Math.round(Math.min(settings.maxDelayMs, jittered));
}

/** Whether a failed outcome is eligible for another attempt. */
export function isRetryable(
  outcome: StageOutcome,
  stage: Pick<Stage['definition'], 'retryable' | 'retry'>,
): boolean {
  if (outcome.kind !== 'failure' || !stage.retryable) return false;
  if (outcome.failure === 'retryable') return true;
  return outcome.failure === 'timeout' && stage.retry.retryOnTimeout;
}

async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await delay(ms, undefined, { signal });
}

/** Create a retry policy. */
export function createRetryPolicy(deps: RetryPolicyDeps = {}): RetryPolicy {
  const run = deps.run ?? runStage;
  const sleep = deps.sleep ?? abortableSleep;
  const random = deps.random ?? Math.random;

  return {
    async execute(stage, input, resources, options): Promise<RetriedResult> {
      const { definition } = stage;
      const { logger, signal } = options;
      let attempts = 0;

      for (;;) {
        attempts += 1;
        const result = await run(stage, input, resources, options);
        const { outcome } = result;

        if (outcome.kind !== 'failure') return { result, attempts };
        if (outcome.failure === 'cancelled') return { result, attempts };

        const retriesUsed = attempts - 1;
        if (!isRetryable(outcome, definition)) return { result, attempts };

        if (retriesUsed >= definition.retry.maxRetries) {
          logger.warn(
            { stage: definition.name, attempts },
            'Retries exhausted',
          );
          return { result, attempts };
        }

        const state: RetryState = {
          attemptNumber: attempts,
          lastError: outcome.message,
          nextDelayMs: backoffDelay(retriesUsed, definition.retry, random),
        };
        logger.warn(
          { stage: definition.name, ...state },
          'Retryable stage failure, backing off',
        );

        try {
          await sleep(state.nextDelayMs, signal);
        } catch {
          return {
            result: {
              ...result,
              outcome: failure('cancelled', 'Run cancelled during retry backoff'),
              timestamp: new Date().toISOString(),
            },
            attempts,
          };
        }

        if (signal?.aborted) {
          return {
            result: {
              ...result,
              outcome: failure('cancelled', 'Run cancelled before retry'),
              timestamp: new Date().toISOString(),
            },
            attempts,
          };
        }
      }
    },
  };
}
