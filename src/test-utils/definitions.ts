/**
 * Stage and pipeline definition builders for tests. Definitions go through the
 * zod schemas so defaults match what a loaded config produces.
 */

import {
  type BuiltinStageDefinition,
  builtinStageSchema,
  type CommandStageDefinition,
  commandStageSchema,
  type PipelineDefinition,
  pipelineDefinitionSchema,
  type PipelineDefinitionInput,
  type ScriptStageDefinition,
  scriptStageSchema,
} from '../schemas/pipeline.js';

type Overrides<T> = Partial<Omit<T, 'type'>>;

export function scriptStage(
  overrides: Overrides<ScriptStageDefinition> & { name: string; script: string },
): ScriptStageDefinition {
  return scriptStageSchema.parse({ ...overrides, type: 'script' });
}

export function commandStage(
  overrides: Overrides<CommandStageDefinition> & { name: string; command: string },
): CommandStageDefinition {
  return commandStageSchema.parse({ ...overrides, type: 'command' });
}

export function builtinStage(
  overrides: Overrides<BuiltinStageDefinition> & { name: string; builtin: string },
): BuiltinStageDefinition {
  return builtinStageSchema.parse({ ...overrides, type: 'builtin' });
}

export function pipelineDefinition(
  input: PipelineDefinitionInput,
): PipelineDefinition {
  return pipelineDefinitionSchema.parse(input);
}
