/**
 * Tests for the warehouse repository.
 */

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTestWarehouse, type TestDb } from '../test-utils/db.js';
import { decodeMediaFile } from './media.js';
import {
  channelId,
  clampLimit,
  clampOffset,
  createWarehouseRepository,
  type WarehouseRepository,
} from './repository.js';

describe('warehouse repository', () => {
  let testDb: TestDb;
  let warehouse: WarehouseRepository;

  beforeEach(() => {
    testDb = createTestWarehouse();
    warehouse = createWarehouseRepository(testDb.db);
  });

  afterEach(() => {
    testDb.cleanup();
  });

  const count = (table: string): number =>
    testDb.db
      .prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`)
      .get()?.count ?? 0;

  it('should load messages and mark the file loaded', () => {
    const path = '2024-01-15/test_channel_a/messages_test_channel_a.json';

    expect(warehouse.isLoaded(path)).toBe(false);
    expect(
      warehouse.loadMessages(path, 'test_channel_a', [
        { id: 1, date: '2024-01-15T08:00:00' },
        { id: 2, date: null },
      ]),
    ).toBe(2);

    expect(warehouse.isLoaded(path)).toBe(true);
    const rows = testDb.db
      .prepare<[], { channel_username: string; message_date: string | null; message_data: string }>(
        'SELECT channel_username, message_date, message_data FROM raw_telegram_messages ORDER BY id',
      )
      .all();
    expect(rows).toEqual([
      {
        channel_username: 'test_channel_a',
        message_date: '2024-01-15T08:00:00',
        message_data: '{"id":1,"date":"2024-01-15T08:00:00"}',
      },
      {
        channel_username: 'test_channel_a',
        message_date: null,
        message_data: '{"id":2,"date":null}',
      },
    ]);
  });

  it('should roll back a file that was already loaded', () => {
    const path = 'test_channel_a/media_info_test_channel_a.json';
    const items = decodeMediaFile([{ message_id: 1, media_type: 'photo' }]);
    warehouse.loadMedia(path, 'test_channel_a', items);

    expect(() => warehouse.loadMedia(path, 'test_channel_a', items)).toThrow();
    expect(count('raw_telegram_media')).toBe(1);
  });

  it('should resolve configured usernames, surrogate ids and stored ids', () => {
    const id = channelId('test_channel_b');
    testDb.db
      .prepare('INSERT INTO fct_messages (message_id, channel_id) VALUES (?, ?)')
      .run(1, id);

    expect(warehouse.resolveChannel('test_channel_a', ['test_channel_a'])).toBe(
      channelId('test_channel_a'),
    );
    expect(
      warehouse.resolveChannel(channelId('test_channel_a'), ['test_channel_a']),
    ).toBe(channelId('test_channel_a'));
    expect(warehouse.resolveChannel('test_channel_b', [])).toBe(id);
    expect(warehouse.resolveChannel(id, [])).toBe(id);
    expect(warehouse.resolveChannel('unknown', [])).toBeNull();
  });

  it('should derive the surrogate id as an md5 hex digest', () => {
    expect(channelId('')).toBe('d41d8cd98f00b204e9800998ecf8427e');
  });
});

describe('page bounds', () => {
  it.each([
    [undefined, 50],
    [Number.NaN, 50],
    [0, 1],
    [-3, 1],
    [25.9, 25],
    [150, 100],
  ])('clampLimit(%s) = %s', (input, expected) => {
    expect(clampLimit(input)).toBe(expected);
  });

  it.each([
    [undefined, 0],
    [-5, 0],
    [10, 10],
  ])('clampOffset(%s) = %s', (input, expected) => {
    expect(clampOffset(input)).toBe(expected);
  });
});
