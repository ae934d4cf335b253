/**
 * Run and stage execution record schemas and types.
 *
 * @module
 */

import { z } from 'zod';

/** Run status enumeration schema (pending, running, succeeded, failed). */
export const runStatusSchema = z.enum([
  'pending',
  'running',
  'succeeded',
  'failed',
]);

/** Stage execution status enumeration schema. */
export const stageStatusSchema = z.enum([
  'pending',
  'running',
  'succeeded',
  'failed',
  'skipped',
]);

/** Run trigger type enumeration schema (schedule, manual). */
export const runTriggerSchema = z.enum(['schedule', 'manual']);

/** Failure classification attached to a failed stage execution. */
export const failureKindSchema = z.enum([
  'retryable',
  'fatal',
  'timeout',
  'stage-not-found',
  'cancelled',
]);

/**
 * Payload exchanged across the stage boundary. Each stage receives the upstream
 * stage's output payload and produces one of its own.
 */
export const stagePayloadSchema = z.object({
  status: z.enum(['success', 'skipped', 'failure']),
  /** ISO timestamp when the payload was produced. */
  timestamp: z.string(),
  data: z.unknown().optional(),
  error: z.string().optional(),
});

/** Record of one stage's outcome within a run. */
export const stageExecutionSchema = z.object({
  stageName: z.string(),
  /** Number of times the stage was invoked (0 when skipped because of an upstream skip). */
  attemptCount: z.number(),
  status: stageStatusSchema,
  startedAt: z.string().optional(),
  endedAt: z.string().optional(),
  durationMs: z.number().optional(),
  input: stagePayloadSchema.optional(),
  output: stagePayloadSchema.optional(),
  errorKind: failureKindSchema.optional(),
  errorMessage: z.string().optional(),
  /** Last lines of stdout captured from the stage. */
  stdoutTail: z.string().optional(),
  /** Last lines of stderr captured from the stage. */
  stderrTail: z.string().optional(),
});

/** Run record representing one end-to-end execution of a pipeline. */
export const runSchema = z.object({
  /** Unique run identifier. */
  id: z.number(),
  pipelineName: z.string(),
  status: runStatusSchema,
  trigger: runTriggerSchema.default('schedule'),
  /** ISO timestamp of the trigger that created the run. */
  triggerTime: z.string(),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  durationMs: z.number().optional(),
  /** Name of the first stage that failed, if any. */
  failedStage: z.string().optional(),
  error: z.string().optional(),
  /** Stage executions in graph order. */
  stages: z.array(stageExecutionSchema),
});

export type Run = z.infer<typeof runSchema>;
export type RunStatus = z.infer<typeof runStatusSchema>;
export type RunTrigger = z.infer<typeof runTriggerSchema>;
export type StageExecution = z.infer<typeof stageExecutionSchema>;
export type StageStatus = z.infer<typeof stageStatusSchema>;
export type StagePayload = z.infer<typeof stagePayloadSchema>;
export type FailureKind = z.infer<typeof failureKindSchema>;
