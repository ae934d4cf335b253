/**
 * Resource provider. Maps the resource kinds a stage declares to connection
 * parameters taken from the service configuration. A snapshot is taken once per
 * run so every stage of that run sees the same values.
 *
 * @module
 */

import { ConfigError } from '../lib/errors.js';
import type { ResourcesConfig } from '../schemas/config.js';
import type { ResourceKind, StageDefinition } from '../schemas/pipeline.js';

export interface DatabaseResource {
  /** Path to the SQLite warehouse. */
  path: string;
}

export interface RawStorageResource {
  dataDir: string;
}

export interface PlatformApiResource {
  apiId: string;
  apiHash: string;
  phone: string;
  sessionPath: string;
  channels: readonly string[];
}

/** Resource kind to parameter shape. */
export interface ResourceMap {
  database: DatabaseResource;
  'raw-storage': RawStorageResource;
  'platform-api': PlatformApiResource;
}

/** Resolved parameters for the resources one stage declared. */
export type ResourceBundle = { readonly [K in ResourceKind]?: Readonly<ResourceMap[K]> };

export type ResolveResult =
  | { ok: true; bundle: ResourceBundle }
  | { ok: false; missing: ResourceKind[] };

/** Immutable view of resource configuration for one run. */
export interface ResourceSnapshot {
  /** Resolve the bundle for a stage. */
  resolve(stage: Pick<StageDefinition, 'resources'>): ResolveResult;
  /**
   * Throw ConfigError if a non-optional stage declares a resource that cannot
   * be resolved.
   */
  validate(pipelineName: string, stages: readonly StageDefinition[]): void;
}

/** Resource provider handed to the run coordinator. */
export interface ResourceProvider {
  snapshot(): ResourceSnapshot;
}

/** Build each available resource from configuration; absent credentials yield a reason. */
function buildResources(
  config: ResourcesConfig,
): { available: ResourceBundle; reasons: Partial<Record<ResourceKind, string>> } {
  const reasons: Partial<Record<ResourceKind, string>> = {};
  const { apiId, apiHash, phone, sessionPath, channels } = config.platformApi;

  let platformApi: PlatformApiResource | undefined;
  if (apiId && apiHash && phone) {
    platformApi = Object.freeze({
      apiId,
      apiHash,
      phone,
      sessionPath,
      channels: Object.freeze([...channels]),
    });
  } else {
    const absent = [
      apiId ? null : 'TELEGRAM_APP_ID',
      apiHash ? null : 'TELEGRAM_API_HASH',
      phone ? null : 'TELEGRAM_PHONE',
    ].filter((v): v is string => v !== null);
    reasons['platform-api'] = `missing ${absent.join(', ')}`;
  }

  const available: ResourceBundle = {
    database: Object.freeze({ path: config.database.path }),
    'raw-storage': Object.freeze({ dataDir: config.rawStorage.dataDir }),
    ...(platformApi ? { 'platform-api': platformApi } : {}),
  };

  return { available, reasons };
}

/** Create a resource provider over the given configuration section. */
export function createResourceProvider(
  config: ResourcesConfig,
): ResourceProvider {
  return {
    snapshot(): ResourceSnapshot {
      const { available, reasons } = buildResources(
        structuredClone(config),
      );

      function resolve(stage: Pick<StageDefinition, 'resources'>): ResolveResult {
        const missing = stage.resources.filter((kind) => !available[kind]);
        if (missing.length > 0) return { ok: false, missing };

        return { ok: true, bundle: pick(available, stage.resources) };
      }

      return {
        resolve,

        validate(pipelineName, stages): void {
          const problems: string[] = [];
          for (const stage of stages) {
            if (stage.optional) continue;
            const result = resolve(stage);
            if (result.ok) continue;
            for (const kind of result.missing) {
              problems.push(
                `stage '${stage.name}' requires ${kind} (${reasons[kind] ?? 'not configured'})`,
              );
            }
          }
          if (problems.length > 0) {
            throw new ConfigError(
              `Pipeline '${pipelineName}' cannot start: ${problems.join('; ')}`,
            );
          }
        },
      };
    },
  };
}

/** Narrow the available resources to the declared kinds. */
function pick(
  available: ResourceBundle,
  kinds: readonly ResourceKind[],
): ResourceBundle {
  const { database, 'raw-storage': rawStorage, 'platform-api': platformApi } =
    available;
  return Object.freeze({
    ...(database && kinds.includes('database') ? { database } : {}),
    ...(rawStorage && kinds.includes('raw-storage')
      ? { 'raw-storage': rawStorage }
      : {}),
    ...(platformApi && kinds.includes('platform-api')
      ? { 'platform-api': platformApi }
      : {}),
  });
}

/** Map a bundle onto environment variables for process stages. */
export function toEnvironment(bundle: ResourceBundle): Record<string, string> {
  const env: Record<string, string> = {};
  const database = bundle.database;
  if (database) env.WAREHOUSE_DB_PATH = database.path;
  const raw = bundle['raw-storage'];
  if (raw) env.RAW_DATA_DIR = raw.dataDir;
  const api = bundle['platform-api'];
  if (api) {
    env.TELEGRAM_APP_ID = api.apiId;
    env.TELEGRAM_API_HASH = api.apiHash;
    env.TELEGRAM_PHONE = api.phone;
    env.TELEGRAM_SESSION_PATH = api.sessionPath;
    env.TELEGRAM_CHANNELS = api.channels.join(',');
  }
  return env;
}
