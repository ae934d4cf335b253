/**
 * Tests for the resource provider.
 */

import { describe, expect, it } from 'vitest';

import { ConfigError } from '../lib/errors.js';
import { type ResourcesConfig, serviceConfigSchema } from '../schemas/config.js';
import { builtinStage } from '../test-utils/definitions.js';
import { createResourceProvider, toEnvironment } from './resources.js';

function resources(platformApi: object = {}): ResourcesConfig {
  return serviceConfigSchema.parse({
    resources: {
      database: { path: '/data/warehouse.sqlite' },
      rawStorage: { dataDir: '/data/raw' },
      platformApi,
    },
  }).resources;
}

const credentials = {
  apiId: '12345',
  apiHash: 'test-hash',
  phone: '+10000000000',
  channels: ['channel_one'],
};

describe('createResourceProvider', () => {
  it('resolves only the declared resources', () => {
    const snapshot = createResourceProvider(resources(credentials)).snapshot();

    const result = snapshot.resolve({ resources: ['database'] });

    expect(result).toEqual({
      ok: true,
      bundle: { database: { path: '/data/warehouse.sqlite' } },
    });
  });

  it('reports missing platform credentials', () => {
    const snapshot = createResourceProvider(resources()).snapshot();

    expect(snapshot.resolve({ resources: ['raw-storage', 'platform-api'] })).toEqual({
      ok: false,
      missing: ['platform-api'],
    });
  });

  it('isolates a snapshot from later config changes', () => {
    const config = resources(credentials);
    const snapshot = createResourceProvider(config).snapshot();
    config.database.path = '/elsewhere.sqlite';

    const result = snapshot.resolve({ resources: ['database'] });

    expect(result.ok && result.bundle.database?.path).toBe('/data/warehouse.sqlite');
    expect(result.ok && Object.isFrozen(result.bundle.database)).toBe(true);
  });

  it('validate throws ConfigError naming the stage and missing variables', () => {
    const snapshot = createResourceProvider(resources({ apiId: '12345' })).snapshot();
    const scrape = builtinStage({
      name: 'scrape',
      builtin: 'fake',
      resources: ['platform-api'],
    });

    expect(() => snapshot.validate('telegram_pipeline', [scrape])).toThrow(
      new ConfigError(
        "Pipeline 'telegram_pipeline' cannot start: stage 'scrape' requires platform-api (missing TELEGRAM_API_HASH, TELEGRAM_PHONE)",
      ),
    );
  });

  it('validate ignores optional stages', () => {
    const snapshot = createResourceProvider(resources()).snapshot();
    const enrich = builtinStage({
      name: 'enrich',
      builtin: 'fake',
      resources: ['platform-api'],
      optional: true,
    });

    expect(() => snapshot.validate('telegram_pipeline', [enrich])).not.toThrow();
  });
});

describe('toEnvironment', () => {
  it('maps every resource to its environment variables', () => {
    const snapshot = createResourceProvider(resources(credentials)).snapshot();
    const result = snapshot.resolve({
      resources: ['database', 'raw-storage', 'platform-api'],
    });
    if (!result.ok) throw new Error('expected resources to resolve');

    expect(toEnvironment(result.bundle)).toEqual({
      WAREHOUSE_DB_PATH: '/data/warehouse.sqlite',
      RAW_DATA_DIR: '/data/raw',
      TELEGRAM_APP_ID: '12345',
      TELEGRAM_API_HASH: 'test-hash',
      TELEGRAM_PHONE: '+10000000000',
      TELEGRAM_SESSION_PATH: './data/sessions/telegram_session',
      TELEGRAM_CHANNELS: 'channel_one',
    });
  });
});
