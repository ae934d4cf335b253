/**
 * Public API exports for telegram-pipeline.
 *
 * @module
 */

// Schemas
export type { ResourcesConfig, ServiceConfig } from './schemas/config.js';
export { serviceConfigSchema, TELEGRAM_PIPELINE } from './schemas/config.js';
export type {
  PipelineDefinition,
  PipelineDefinitionInput,
  StageDefinition,
} from './schemas/pipeline.js';
export { pipelineDefinitionSchema, stageDefinitionSchema } from './schemas/pipeline.js';
export type {
  FailureKind,
  Run,
  RunStatus,
  RunTrigger,
  StageExecution,
  StagePayload,
} from './schemas/run.js';
export { runSchema, runStatusSchema, runTriggerSchema } from './schemas/run.js';

// Configuration and errors
export { loadConfig, parseConfig } from './config/load.js';
export { ConfigError, PipelineGraphError, PipelineNotFoundError } from './lib/errors.js';

// Pipelines and stages
export type { Pipeline } from './pipeline/pipeline.js';
export { createPipeline } from './pipeline/pipeline.js';
export type { Stage, StageContext, StageOutcome, StageReport } from './pipeline/stage.js';
export { failure, skip, success } from './pipeline/stage.js';
export type { BuiltinFactory, StageFactory } from './stages/registry.js';
export { BUILTIN_STAGES, createStageFactory } from './stages/registry.js';

// Runner
export type { Runner, RunnerDeps } from './runner.js';
export { compilePipelines, createRunner, runPipelineOnce } from './runner.js';
