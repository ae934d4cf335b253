/**
 * Stage factory. Turns validated stage definitions into Stage implementations.
 *
 * @module
 */

import { ConfigError } from '../lib/errors.js';
import type { Stage } from '../pipeline/stage.js';
import type {
  BuiltinStageDefinition,
  StageDefinition,
} from '../schemas/pipeline.js';
import { createLoadRawStage } from './load-raw.js';
import { createCommandStage, createScriptStage } from './process-stage.js';

/** Factory for an in-process builtin stage. */
export type BuiltinFactory = (definition: BuiltinStageDefinition) => Stage;

/** Builtins available to pipeline definitions. */
export const BUILTIN_STAGES: Readonly<Record<string, BuiltinFactory>> = {
  'load-raw': createLoadRawStage,
};

/** Signature of the stage factory, so callers can substitute fakes. */
export type StageFactory = (definition: StageDefinition) => Stage;

/** Create a stage factory over a builtin registry. Unknown builtins are a ConfigError. */
export function createStageFactory(
  builtins: Readonly<Record<string, BuiltinFactory>> = BUILTIN_STAGES,
): StageFactory {
  return (definition) => {
    switch (definition.type) {
      case 'script':
        return createScriptStage(definition);
      case 'command':
        return createCommandStage(definition);
      case 'builtin': {
        const factory = builtins[definition.builtin];
        if (!factory) {
          throw new ConfigError(
            `Stage '${definition.name}' uses unknown builtin '${definition.builtin}'`,
          );
        }
        return factory(definition);
      }
    }
  };
}
