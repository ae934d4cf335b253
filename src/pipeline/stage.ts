/**
 * Stage capability interface and the three-way outcome every invocation
 * returns. Stages may run in-process or as external processes; the coordinator
 * sees only this contract.
 *
 * @module
 */

import type { Logger } from 'pino';

import type { StageDefinition } from '../schemas/pipeline.js';
import type { FailureKind, StagePayload } from '../schemas/run.js';
import type { ResourceBundle } from './resources.js';

/** Outcome of one stage invocation. */
export type StageOutcome =
  | { kind: 'success'; data?: unknown }
  | { kind: 'skip'; reason: string }
  | { kind: 'failure'; failure: FailureKind; message: string };

/** What a stage implementation reports back. */
export interface StageReport {
  outcome: StageOutcome;
  stdoutTail?: string;
  stderrTail?: string;
}

/** Per-invocation context handed to a stage. */
export interface StageContext {
  /** Aborted on timeout or run cancellation. */
  signal: AbortSignal;
  pipelineName: string;
  runId: number;
  logger: Logger;
}

/** A registered unit of pipeline work. */
export interface Stage {
  /** Frozen definition the stage was registered with. */
  readonly definition: Readonly<StageDefinition>;
  run(
    input: StagePayload,
    resources: ResourceBundle,
    context: StageContext,
  ): Promise<StageReport>;
}

export const success = (data?: unknown): StageOutcome =>
  data === undefined ? { kind: 'success' } : { kind: 'success', data };

export const skip = (reason: string): StageOutcome => ({ kind: 'skip', reason });

export const failure = (failure: FailureKind, message: string): StageOutcome => ({
  kind: 'failure',
  failure,
  message,
});

/** Convert an outcome into the payload handed to downstream stages. */
export function toPayload(outcome: StageOutcome, timestamp: string): StagePayload {
  switch (outcome.kind) {
    case 'success':
      return outcome.data === undefined
        ? { status: 'success', timestamp }
        : { status: 'success', timestamp, data: outcome.data };
    case 'skip':
      return { status: 'skipped', timestamp, data: { reason: outcome.reason } };
    case 'failure':
      return { status: 'failure', timestamp, error: outcome.message };
  }
}
