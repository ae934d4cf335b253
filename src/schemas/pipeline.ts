/**
 * Pipeline and stage definition schemas.
 *
 * @module
 */

import { z } from 'zod';

/** Resource kinds a stage may declare. */
export const resourceKindSchema = z.enum([
  'database',
  'raw-storage',
  'platform-api',
]);

/** Per-stage retry settings. */
export const retrySettingsSchema = z.object({
  /** Maximum number of retries after the first attempt. */
  maxRetries: z.number().int().min(0).default(3),
  /** Base delay for exponential backoff in milliseconds. */
  baseDelayMs: z.number().int().min(0).default(5000),
  /** Upper bound for a single backoff delay in milliseconds. */
  maxDelayMs: z.number().int().min(0).default(60000),
  /** Fraction of the delay added as random jitter (0 disables jitter). */
  jitter: z.number().min(0).max(1).default(0.2),
  /** Whether a timed-out attempt counts as retryable. */
  retryOnTimeout: z.boolean().default(false),
});

const stageBaseSchema = z.object({
  /** Unique stage name within the pipeline. */
  name: z.string().min(1),
  /** Optional human-readable description. */
  description: z.string().optional(),
  /** Resources this stage needs resolved before it runs. */
  resources: z.array(resourceKindSchema).default([]),
  /** Whether retryable failures are retried with backoff. */
  retryable: z.boolean().default(false),
  retry: retrySettingsSchema.default({}),
  /** Execution timeout in milliseconds. */
  timeoutMs: z.number().int().positive().default(3600000),
  /** An optional stage whose executable or resource is absent is skipped, not failed. */
  optional: z.boolean().default(false),
  /** Upstream stage names. Defaults to the previously declared stage. */
  dependsOn: z.array(z.string()).optional(),
});

/** Stage that runs a script file; the interpreter is chosen by file extension. */
export const scriptStageSchema = stageBaseSchema.extend({
  type: z.literal('script'),
  /** Path to the script, relative to the working directory. */
  script: z.string().min(1),
  /** Interpreter override (e.g. `python3.11`). */
  interpreter: z.string().optional(),
});

/** Stage that runs an arbitrary executable. */
export const commandStageSchema = stageBaseSchema.extend({
  type: z.literal('command'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  /** Working directory for the command. */
  cwd: z.string().optional(),
});

/** Stage implemented in-process by a registered builtin. */
export const builtinStageSchema = stageBaseSchema.extend({
  type: z.literal('builtin'),
  /** Builtin identifier, e.g. `load-raw`. */
  builtin: z.string().min(1),
});

/** Stage definition schema, discriminated by `type`. */
export const stageDefinitionSchema = z.discriminatedUnion('type', [
  scriptStageSchema,
  commandStageSchema,
  builtinStageSchema,
]);

/** Pipeline definition schema. */
export const pipelineDefinitionSchema = z.object({
  /** Unique pipeline name. */
  name: z.string().min(1),
  description: z.string().optional(),
  /** Cron expression defining the pipeline schedule. */
  schedule: z.string().default('0 0 * * *'),
  /** IANA timezone the schedule is evaluated in. */
  timezone: z.string().default('UTC'),
  /** Whether the pipeline is scheduled. Disabled pipelines can still be triggered manually. */
  enabled: z.boolean().default(true),
  /** Optional overall run budget in milliseconds. */
  timeoutMs: z.number().int().positive().optional(),
  /** Slack channel ID for success notifications. */
  onSuccess: z.string().nullable().default(null),
  /** Slack channel ID for failure notifications. */
  onFailure: z.string().nullable().default(null),
  stages: z.array(stageDefinitionSchema).min(1),
});

export type ResourceKind = z.infer<typeof resourceKindSchema>;
export type RetrySettings = z.infer<typeof retrySettingsSchema>;
export type StageDefinition = z.infer<typeof stageDefinitionSchema>;
export type ScriptStageDefinition = z.infer<typeof scriptStageSchema>;
export type CommandStageDefinition = z.infer<typeof commandStageSchema>;
export type BuiltinStageDefinition = z.infer<typeof builtinStageSchema>;
export type PipelineDefinition = z.infer<typeof pipelineDefinitionSchema>;
/** Pipeline definition as written in a config file, before defaults apply. */
export type PipelineDefinitionInput = z.input<typeof pipelineDefinitionSchema>;
