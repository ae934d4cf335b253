/**
 * Pipeline graph. Validates the declared stages as a single-entry DAG and
 * produces a deterministic execution order.
 *
 * @module
 */

import { PipelineGraphError } from '../lib/errors.js';
import type { StageDefinition } from '../schemas/pipeline.js';

/** Static stage graph built at startup. */
export interface PipelineGraph {
  readonly pipelineName: string;
  /** Stage names in declaration order. */
  readonly stageNames: readonly string[];
  /** Stage names ordered so every stage follows all of its upstreams. */
  topologicalOrder(): string[];
  /** Direct upstream stage names, in declaration order. */
  upstreamOf(stageName: string): string[];
  /** Direct downstream stage names, in declaration order. */
  downstreamOf(stageName: string): string[];
  /** The single stage without upstreams. */
  entryStage(): string;
}

/**
 * Build and validate a graph. A stage without `dependsOn` depends on the stage
 * declared before it; the first declared stage has no upstream unless it says so.
 */
export function createPipelineGraph(
  pipelineName: string,
  stages: readonly Pick<StageDefinition, 'name' | 'dependsOn'>[],
): PipelineGraph {
  if (stages.length === 0) {
    throw new PipelineGraphError(pipelineName, 'no stages declared');
  }

  const names = stages.map((s) => s.name);
  const position = new Map<string, number>();
  for (const [index, name] of names.entries()) {
    if (position.has(name)) {
      throw new PipelineGraphError(pipelineName, `duplicate stage '${name}'`);
    }
    position.set(name, index);
  }

  const upstream = new Map<string, string[]>();
  const downstream = new Map<string, string[]>(names.map((n) => [n, []]));

  for (const [index, stage] of stages.entries()) {
    const previous = index > 0 ? names[index - 1] : undefined;
    const declared =
      stage.dependsOn ?? (previous === undefined ? [] : [previous]);
    const deps = [...new Set(declared)];

    for (const dep of deps) {
      if (dep === stage.name) {
        throw new PipelineGraphError(
          pipelineName,
          `stage '${stage.name}' depends on itself`,
        );
      }
      if (!position.has(dep)) {
        throw new PipelineGraphError(
          pipelineName,
          `stage '${stage.name}' depends on unknown stage '${dep}'`,
        );
      }
      downstream.get(dep)?.push(stage.name);
    }

    upstream.set(
      stage.name,
      deps.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0)),
    );
  }

  const entries = names.filter((n) => (upstream.get(n) ?? []).length === 0);
  if (entries.length !== 1) {
    throw new PipelineGraphError(
      pipelineName,
      entries.length === 0
        ? 'no entry stage (every stage has an upstream)'
        : `expected exactly one entry stage, found ${entries.join(', ')}`,
    );
  }

  // Kahn's algorithm; the ready set is kept in declaration order.
  const remaining = new Map(
    names.map((n) => [n, (upstream.get(n) ?? []).length] as const),
  );
  const ready = [...entries];
  const order: string[] = [];
  while (ready.length > 0) {
    ready.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
    const next = ready.shift();
    if (next === undefined) break;
    order.push(next);
    for (const child of downstream.get(next) ?? []) {
      const count = (remaining.get(child) ?? 0) - 1;
      remaining.set(child, count);
      if (count === 0) ready.push(child);
    }
  }

  if (order.length !== names.length) {
    const cyclic = names.filter((n) => !order.includes(n));
    throw new PipelineGraphError(
      pipelineName,
      `cycle detected among ${cyclic.join(', ')}`,
    );
  }

  const frozenOrder = Object.freeze(order);

  function known(stageName: string): void {
    if (!position.has(stageName)) {
      throw new PipelineGraphError(
        pipelineName,
        `unknown stage '${stageName}'`,
      );
    }
  }

  return {
    pipelineName,
    stageNames: Object.freeze([...names]),
    topologicalOrder: () => [...frozenOrder],
    upstreamOf(stageName) {
      known(stageName);
      return [...(upstream.get(stageName) ?? [])];
    },
    downstreamOf(stageName) {
      known(stageName);
      return [...(downstream.get(stageName) ?? [])];
    },
    entryStage: () => entries[0] ?? '',
  };
}
