/**
 * Service configuration schema and types.
 *
 * @module
 */

import { z } from 'zod';

import {
  type PipelineDefinitionInput,
  pipelineDefinitionSchema,
} from './pipeline.js';

/** Notification configuration sub-schema. */
const notificationsSchema = z.object({
  /** Path to Slack bot token file. */
  slackTokenPath: z.string().optional(),
  /** Default Slack channel ID for failure notifications. */
  defaultOnFailure: z.string().nullable().default(null),
  /** Default Slack channel ID for success notifications. */
  defaultOnSuccess: z.string().nullable().default(null),
});

/** Log configuration sub-schema. */
const logSchema = z.object({
  /** Log level threshold (trace, debug, info, warn, error, fatal, silent). */
  level: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('info'),
  /** Optional log file path. */
  file: z.string().optional(),
});

/** Connection parameters for the messaging platform API. */
const platformApiSchema = z.object({
  apiId: z.string().optional(),
  apiHash: z.string().optional(),
  phone: z.string().optional(),
  /** Path of the persisted client session. */
  sessionPath: z.string().default('./data/sessions/telegram_session'),
  /** Channel usernames to scrape. */
  channels: z.array(z.string()).default([]),
});

/** Resource configuration sub-schema. */
const resourcesSchema = z.object({
  database: z
    .object({
      /** Path to the SQLite analytical warehouse. */
      path: z.string().default('./data/warehouse.sqlite'),
    })
    .default({}),
  rawStorage: z
    .object({
      /** Directory the scrape stage writes raw JSON into. */
      dataDir: z.string().default('./data/raw'),
    })
    .default({}),
  platformApi: platformApiSchema.default({}),
});

/** Reference pipeline: scrape → load → transform → enrich, daily at midnight UTC. */
export const TELEGRAM_PIPELINE: PipelineDefinitionInput = {
  name: 'telegram_pipeline',
  description: 'Scrape channels, load raw records, run transformations, enrich images',
  schedule: '0 0 * * *',
  timezone: 'UTC',
  stages: [
    {
      name: 'scrape',
      type: 'script',
      script: 'scripts/scraping.py',
      resources: ['platform-api', 'raw-storage'],
      retryable: true,
    },
    {
      name: 'load',
      type: 'builtin',
      builtin: 'load-raw',
      resources: ['database', 'raw-storage'],
    },
    {
      name: 'transform',
      type: 'command',
      command: 'dbt',
      args: ['run', '--profiles-dir', '.'],
      cwd: 'telegram_data',
      resources: ['database'],
    },
    {
      name: 'enrich',
      type: 'script',
      script: 'scripts/detect_objects.py',
      resources: ['database', 'raw-storage'],
      optional: true,
    },
  ],
};

/** Full service configuration schema. Validates and provides defaults. */
export const serviceConfigSchema = z.object({
  /** HTTP server port for the API. */
  port: z.number().int().min(0).default(3100),
  /** HTTP bind address. */
  host: z.string().default('127.0.0.1'),
  /** Path to the SQLite run history database. */
  historyDbPath: z.string().default('./data/history.sqlite'),
  /** Number of days to retain run records. */
  runRetentionDays: z.number().default(30),
  /** Interval in milliseconds between maintenance passes. */
  maintenanceIntervalMs: z.number().default(3600000),
  /** Grace period in milliseconds for in-flight runs on shutdown. */
  shutdownGraceMs: z.number().default(30000),
  /** Notification configuration for run completion events. */
  notifications: notificationsSchema.default({
    defaultOnFailure: null,
    defaultOnSuccess: null,
  }),
  /** Logging configuration. */
  log: logSchema.default({ level: 'info' }),
  /** Connection parameters handed to stages through the resource provider. */
  resources: resourcesSchema.default({}),
  /** Pipeline definitions. */
  pipelines: z.array(pipelineDefinitionSchema).default([TELEGRAM_PIPELINE]),
});

/** Inferred service configuration type. */
export type ServiceConfig = z.infer<typeof serviceConfigSchema>;
/** Resource section of the service configuration. */
export type ResourcesConfig = ServiceConfig['resources'];
