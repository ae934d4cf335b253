/**
 * CLI program definition.
 *
 * @module
 */

import { Command } from 'commander';

import { registerConfigCommands } from './commands/config.js';
import { registerPipelineCommands } from './commands/pipelines.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('telegram-pipeline')
    .description(
      'Scheduled scrape, load, transform and enrich pipeline with run history and a read API',
    )
    .version('0.1.0');

  registerPipelineCommands(program);
  registerConfigCommands(program);

  return program;
}
