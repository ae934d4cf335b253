/**
 * @module commands/config
 *
 * CLI commands: validate, init, config-show.
 */

import { existsSync, writeFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { Command } from 'commander';

import { loadConfig } from '../../../config/load.js';
import { compilePipelines } from '../../../runner.js';
import { TELEGRAM_PIPELINE } from '../../../schemas/config.js';

/** Starter config template. */
const INIT_CONFIG_TEMPLATE = {
  port: 3100,
  historyDbPath: './data/history.sqlite',
  runRetentionDays: 30,
  log: {
    level: 'info',
  },
  notifications: {
    slackTokenPath: '',
    defaultOnFailure: null,
    defaultOnSuccess: null,
  },
  resources: {
    database: { path: './data/warehouse.sqlite' },
    rawStorage: { dataDir: './data/raw' },
    platformApi: { channels: [] },
  },
  pipelines: [TELEGRAM_PIPELINE],
};

const SECRET = '***';

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/** Register config-related commands on the CLI. */
export function registerConfigCommands(cli: Command): void {
  cli
    .command('validate')
    .description('Validate a configuration file and its pipeline graphs')
    .requiredOption('-c, --config <path>', 'Path to configuration file')
    .action((options: { config: string }) => {
      try {
        const config = loadConfig(options.config);
        const pipelines = compilePipelines(config);

        console.log('✅ Config valid');
        console.log(`  Port: ${String(config.port)}`);
        console.log(`  History database: ${config.historyDbPath}`);
        console.log(`  Warehouse: ${config.resources.database.path}`);
        console.log(`  Run retention: ${String(config.runRetentionDays)} days`);
        console.log(`  Log level: ${config.log.level}`);
        for (const pipeline of pipelines) {
          const { name, schedule, timezone } = pipeline.definition;
          console.log(
            `  Pipeline ${name} (${schedule} ${timezone}): ${pipeline.graph.topologicalOrder().join(' → ')}`,
          );
        }
      } catch (error) {
        console.error(`❌ ${describeError(error)}`);
        process.exitCode = 1;
      }
    });

  cli
    .command('init')
    .description('Generate a starter configuration file')
    .option(
      '-o, --output <path>',
      'Output config file path',
      'telegram-pipeline.config.json',
    )
    .action((options: { output: string }) => {
      const outputPath = resolve(options.output);

      if (existsSync(outputPath)) {
        console.error(`❌ File already exists: ${outputPath}`);
        console.error('   Remove it first or choose a different path with -o');
        process.exitCode = 1;
        return;
      }

      writeFileSync(
        outputPath,
        JSON.stringify(INIT_CONFIG_TEMPLATE, null, 2) + '\n',
      );
      console.log(`✅ Wrote ${outputPath}`);
      console.log();
      console.log('Next steps:');
      console.log('  1. Set TELEGRAM_APP_ID, TELEGRAM_API_HASH and TELEGRAM_PHONE in .env');
      console.log('  2. Validate: telegram-pipeline validate -c ' + options.output);
      console.log('  3. Start: telegram-pipeline start -c ' + options.output);
    });

  cli
    .command('config-show')
    .description(
      'Show the resolved configuration (defaults applied, secrets redacted)',
    )
    .requiredOption('-c, --config <path>', 'Path to configuration file')
    .action((options: { config: string }) => {
      try {
        const config = loadConfig(options.config);
        const { platformApi } = config.resources;

        const redacted = {
          ...config,
          notifications: {
            ...config.notifications,
            slackTokenPath: config.notifications.slackTokenPath
              ? SECRET
              : undefined,
          },
          resources: {
            ...config.resources,
            platformApi: {
              ...platformApi,
              apiHash: platformApi.apiHash ? SECRET : undefined,
              phone: platformApi.phone ? SECRET : undefined,
            },
          },
        };

        console.log(JSON.stringify(redacted, null, 2));
      } catch (error) {
        console.error(`❌ ${describeError(error)}`);
        process.exitCode = 1;
      }
    });
}
