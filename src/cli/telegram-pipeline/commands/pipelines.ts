/**
 * @module commands/pipelines
 *
 * CLI commands: start, status, trigger, run, runs.
 */

import type { Command } from 'commander';

import { loadConfig } from '../../../config/load.js';
import { closeConnection, createConnection } from '../../../db/connection.js';
import { runMigrations } from '../../../db/migrations.js';
import { HISTORY_MIGRATIONS } from '../../../history/migrations.js';
import { createRunRepository } from '../../../history/run-repository.js';
import { createRunner, runPipelineOnce } from '../../../runner.js';
import type { ServiceConfig } from '../../../schemas/config.js';
import type { Run } from '../../../schemas/run.js';

/** Options shared by commands that accept --config. */
interface ConfigOptions {
  config?: string;
}

interface RunsOptions extends ConfigOptions {
  since?: string;
  until?: string;
  limit: string;
}

const STATUS_ICON: Record<Run['status'], string> = {
  pending: '⏳',
  running: '▶️',
  succeeded: '✅',
  failed: '❌',
};

/** One-line summary of a run. */
export function formatRun(run: Run): string {
  const duration =
    run.durationMs === undefined ? '' : ` ${(run.durationMs / 1000).toFixed(1)}s`;
  const failure =
    run.status === 'failed'
      ? ` at ${run.failedStage ?? '?'}: ${run.error ?? 'unknown error'}`
      : '';
  return `${STATUS_ICON[run.status]} #${String(run.id)} ${run.triggerTime} ${run.trigger}${duration}${failure}`;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

function apiUrl(config: ServiceConfig, path: string): string {
  return `http://${config.host}:${String(config.port)}${path}`;
}

/** Call the running service and print its JSON reply. */
async function callService(
  config: ServiceConfig,
  path: string,
  method: 'GET' | 'POST' = 'GET',
): Promise<void> {
  try {
    const resp = await fetch(apiUrl(config, path), { method });
    const body: unknown = await resp.json();
    console.log(JSON.stringify(body, null, 2));
    if (!resp.ok) process.exitCode = 1;
  } catch {
    console.error(
      `Service not reachable on port ${String(config.port)}. Is it running?`,
    );
    process.exitCode = 1;
  }
}

/** Register pipeline commands on the CLI. */
export function registerPipelineCommands(cli: Command): void {
  cli
    .command('start')
    .description('Start the scheduler and API server')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: ConfigOptions) => {
      const runner = createRunner(loadConfig(options.config));
      try {
        await runner.start();
      } catch (error) {
        console.error(`❌ ${describeError(error)}`);
        await runner.stop();
        process.exitCode = 1;
      }
    });

  cli
    .command('status')
    .description('Show run statistics of the running service')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (options: ConfigOptions) => {
      await callService(loadConfig(options.config), '/stats');
    });

  cli
    .command('trigger')
    .description('Trigger a pipeline on the running service and wait for it')
    .argument('<pipeline>', 'Pipeline name')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (pipeline: string, options: ConfigOptions) => {
      await callService(
        loadConfig(options.config),
        `/pipelines/${encodeURIComponent(pipeline)}/run`,
        'POST',
      );
    });

  cli
    .command('run')
    .description('Run a pipeline once in this process, without the scheduler')
    .argument('<pipeline>', 'Pipeline name')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (pipeline: string, options: ConfigOptions) => {
      const controller = new AbortController();
      const cancel = (): void => {
        controller.abort();
      };
      process.once('SIGINT', cancel);
      try {
        const result = await runPipelineOnce(loadConfig(options.config), pipeline, {
          signal: controller.signal,
        });
        if (result.status === 'rejected') {
          console.error(`❌ ${pipeline} is already running`);
          process.exitCode = 1;
          return;
        }
        const { run } = result;
        console.log(formatRun(run));
        for (const stage of run.stages) {
          console.log(`  ${stage.stageName}: ${stage.status}`);
        }
        if (run.status !== 'succeeded') process.exitCode = 1;
      } catch (error) {
        console.error(`❌ ${describeError(error)}`);
        process.exitCode = 1;
      } finally {
        process.off('SIGINT', cancel);
      }
    });

  cli
    .command('runs')
    .description('List recorded runs of a pipeline, newest first')
    .argument('<pipeline>', 'Pipeline name')
    .option('-c, --config <path>', 'Path to config file')
    .option('--since <iso>', 'Only runs triggered at or after this time')
    .option('--until <iso>', 'Only runs triggered before this time')
    .option('-n, --limit <count>', 'Maximum number of runs', '20')
    .action((pipeline: string, options: RunsOptions) => {
      const config = loadConfig(options.config);
      const db = createConnection({ dbPath: config.historyDbPath });
      try {
        runMigrations(db, HISTORY_MIGRATIONS);
        const runs = createRunRepository(db).listRuns({
          pipelineName: pipeline,
          since: options.since,
          until: options.until,
          limit: Number.parseInt(options.limit, 10) || 20,
        });

        if (runs.length === 0) {
          console.log(`No runs recorded for ${pipeline}.`);
        }
        for (const run of runs) console.log(formatRun(run));
      } finally {
        closeConnection(db);
      }
    });
}
