/**
 * Error classes raised outside stage execution. Stage failures are values of
 * the stage outcome union, not exceptions.
 */

/** Missing or invalid configuration, credentials or resource paths. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Invalid pipeline graph (cycle, dangling edge, multiple entry stages). */
export class PipelineGraphError extends Error {
  readonly pipelineName: string;

  constructor(pipelineName: string, message: string) {
    super(`Invalid pipeline '${pipelineName}': ${message}`);
    this.name = 'PipelineGraphError';
    this.pipelineName = pipelineName;
  }
}

/** Trigger or lookup for a pipeline that is not registered. */
export class PipelineNotFoundError extends Error {
  readonly pipelineName: string;

  constructor(pipelineName: string) {
    super(`Pipeline not found: ${pipelineName}`);
    this.name = 'PipelineNotFoundError';
    this.pipelineName = pipelineName;
  }
}
