/**
 * Stage runner. Executes one stage invocation with a timeout, converts thrown
 * errors into failures and stamps the result. Does not retry.
 *
 * @module
 */

import type { StagePayload } from '../schemas/run.js';
import { classifyFailure } from './classify.js';
import type { ResourceBundle } from './resources.js';
import {
  failure,
  type Stage,
  type StageContext,
  type StageOutcome,
  type StageReport,
} from './stage.js';

/** Result of one stage invocation. */
export interface StageResult {
  outcome: StageOutcome;
  /** ISO timestamp when the invocation resolved. */
  timestamp: string;
  durationMs: number;
  stdoutTail: string;
  stderrTail: string;
}

/** Options for a single invocation. */
export interface StageRunOptions extends Omit<StageContext, 'signal'> {
  timeoutMs: number;
  /** Run-level cancellation signal. */
  signal?: AbortSignal;
}

/** Signature of the runner, so the retry policy can take a substitute. */
export type RunStage = (
  stage: Stage,
  input: StagePayload,
  resources: ResourceBundle,
  options: StageRunOptions,
) => Promise<StageResult>;

/**
 * Run a stage once. On timeout the stage's signal is aborted and the result is
 * a `timeout` failure even if the stage never settles; on run cancellation the
 * result is a `cancelled` failure.
 */
export const runStage: RunStage = async (stage, input, resources, options) => {
  const { timeoutMs, signal: runSignal, ...context } = options;
  const startTime = Date.now();
  const controller = new AbortController();

  const finish = (
    outcome: StageOutcome,
    stdoutTail = '',
    stderrTail = '',
  ): StageResult => ({
    outcome,
    timestamp: new Date().toISOString(),
    durationMs: Date.now() - startTime,
    stdoutTail,
    stderrTail,
  });

  if (runSignal?.aborted) {
    return finish(failure('cancelled', 'Run cancelled before stage started'));
  }

  let interrupt: (outcome: StageOutcome) => void = () => undefined;
  const interrupted = new Promise<StageOutcome>((resolve) => {
    interrupt = resolve;
  });

  const timeoutHandle = setTimeout(() => {
    interrupt(failure('timeout', `Stage timed out after ${String(timeoutMs)}ms`));
    controller.abort(new Error('timeout'));
  }, timeoutMs);

  const onRunAbort = (): void => {
    interrupt(failure('cancelled', 'Run cancelled'));
    controller.abort(new Error('cancelled'));
  };
  runSignal?.addEventListener('abort', onRunAbort, { once: true });

  const invoke = async (): Promise<StageReport> =>
    stage.run(input, resources, { ...context, signal: controller.signal });
  const invocation = invoke().catch((err: unknown): StageReport => {
    const message = err instanceof Error ? err.message : String(err);
    return { outcome: failure(classifyFailure(message), message) };
  });

  try {
    const settled = await Promise.race([
      invocation,
      interrupted.then((outcome) => ({ outcome, interrupted: true as const })),
    ]);

    if ('interrupted' in settled) {
      // Give a process stage the chance to report its captured output.
      const late = await Promise.race([
        invocation,
        new Promise<null>((resolve) => setTimeout(() => resolve(null), 50)),
      ]);
      return finish(
        settled.outcome,
        late?.stdoutTail ?? '',
        late?.stderrTail ?? '',
      );
    }

    return finish(
      settled.outcome,
      settled.stdoutTail ?? '',
      settled.stderrTail ?? '',
    );
  } finally {
    clearTimeout(timeoutHandle);
    runSignal?.removeEventListener('abort', onRunAbort);
  }
};
