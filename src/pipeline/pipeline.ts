/**
 * A compiled pipeline: its frozen definition, validated graph and one Stage per
 * declared stage.
 *
 * @module
 */

import type { PipelineDefinition, StageDefinition } from '../schemas/pipeline.js';
import { createPipelineGraph, type PipelineGraph } from './graph.js';
import type { Stage } from './stage.js';

export interface Pipeline {
  readonly definition: Readonly<PipelineDefinition>;
  readonly graph: PipelineGraph;
  /** Stage registered under a name. Throws for names outside the graph. */
  stage(name: string): Stage;
}

/**
 * Compile a definition. Throws PipelineGraphError for an invalid graph and
 * whatever the stage factory throws for an unusable stage.
 */
export function createPipeline(
  definition: PipelineDefinition,
  createStage: (definition: StageDefinition) => Stage,
): Pipeline {
  const graph = createPipelineGraph(definition.name, definition.stages);
  const stages = new Map(
    definition.stages.map((s) => [s.name, createStage(s)] as const),
  );
  const frozen = Object.freeze({ ...definition, stages: [...definition.stages] });

  return {
    definition: frozen,
    graph,
    stage(name): Stage {
      const stage = stages.get(name);
      if (!stage) {
        throw new Error(`Stage '${name}' is not part of pipeline '${definition.name}'`);
      }
      return stage;
    },
  };
}
