/**
 * Configuration loading. Reads the JSON config file, overlays environment
 * variables and validates the result. Called once at process start; the
 * returned object is passed explicitly to everything that needs it.
 *
 * @module
 */

import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import type { ZodError } from 'zod';

import { ConfigError } from '../lib/errors.js';
import { type ServiceConfig, serviceConfigSchema } from '../schemas/config.js';

/** Environment variables mapped onto resource configuration. */
const ENV_OVERRIDES = {
  TELEGRAM_APP_ID: ['platformApi', 'apiId'],
  TELEGRAM_API_HASH: ['platformApi', 'apiHash'],
  TELEGRAM_PHONE: ['platformApi', 'phone'],
  TELEGRAM_SESSION_PATH: ['platformApi', 'sessionPath'],
  WAREHOUSE_DB_PATH: ['database', 'path'],
  RAW_DATA_DIR: ['rawStorage', 'dataDir'],
} as const;

type Environment = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read and parse a JSON config file. */
function readConfigFile(configPath: string): unknown {
  const path = resolve(configPath);
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read config file ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch (err) {
    throw new ConfigError(
      `Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/** Overlay non-empty environment variables onto the raw resources section. */
export function applyEnvironment(raw: unknown, env: Environment): unknown {
  const base = isRecord(raw) ? { ...raw } : {};
  const resources: Record<string, unknown> = isRecord(base.resources)
    ? { ...base.resources }
    : {};

  for (const [variable, [section, key]] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value === undefined || value === '') continue;
    const current = resources[section];
    resources[section] = { ...(isRecord(current) ? current : {}), [key]: value };
  }

  const channels = env.TELEGRAM_CHANNELS;
  if (channels) {
    const current = resources.platformApi;
    resources.platformApi = {
      ...(isRecord(current) ? current : {}),
      channels: channels
        .split(',')
        .map((c) => c.trim())
        .filter(Boolean),
    };
  }

  return { ...base, resources };
}

/** Format zod issues as a single readable line per issue. */
function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Validate a raw config object, converting schema errors to ConfigError. */
export function parseConfig(raw: unknown): ServiceConfig {
  const result = serviceConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Config invalid: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load configuration from an optional JSON file and the given environment.
 * Without a file, defaults apply.
 */
export function loadConfig(
  configPath?: string,
  env: Environment = process.env,
): ServiceConfig {
  const raw = configPath ? readConfigFile(configPath) : {};
  return parseConfig(applyEnvironment(raw, env));
}
