/**
 * Warehouse repository: raw record ingestion for the load stage and the
 * queries behind the read API.
 *
 * @module
 */

import { createHash } from 'node:crypto';

import type { Db } from '../db/connection.js';
import type { MediaPayload, RawMessage } from './media.js';

/** Default and maximum page size of a message search. */
export const SEARCH_DEFAULT_LIMIT = 50;
export const SEARCH_MAX_LIMIT = 100;

/** Surrogate channel id, as the transform project derives it. */
export function channelId(username: string): string {
  return createHash('md5').update(username).digest('hex');
}

export interface ChannelActivity {
  /** Calendar day (YYYY-MM-DD). */
  date: string;
  message_count: number;
}

export interface MessageResult {
  message_id: number;
  channel_id: string;
  message_text: string;
  media_date: string | null;
  has_image: boolean | null;
}

export interface SearchPage {
  /** Total matches before the limit/offset slice. */
  count: number;
  results: MessageResult[];
}

/** Kind of raw file the load stage ingests. */
export type RawFileKind = 'messages' | 'media';

export interface WarehouseRepository {
  /** Whether a raw file has already been ingested. */
  isLoaded(path: string): boolean;
  /** Insert a messages file's rows and mark the file loaded, atomically. */
  loadMessages(path: string, channel: string, messages: RawMessage[]): number;
  /** Insert a media file's rows and mark the file loaded, atomically. */
  loadMedia(
    path: string,
    channel: string,
    items: Array<{ media: MediaPayload; raw: unknown }>,
  ): number;
  /**
   * Resolve a channel username or surrogate id to the surrogate id, or null
   * when the channel is neither configured nor present in the warehouse.
   */
  resolveChannel(idOrUsername: string, configured: readonly string[]): string | null;
  getChannelActivity(channelId: string): ChannelActivity[];
  /** Case-insensitive substring search over message text, newest first. */
  searchMessages(query: string, limit?: number, offset?: number): SearchPage;
}

/** Clamp a requested page size to [1, 100]; non-numbers fall back to the default. */
export function clampLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return SEARCH_DEFAULT_LIMIT;
  return Math.min(Math.max(1, Math.trunc(limit)), SEARCH_MAX_LIMIT);
}

export function clampOffset(offset: number | undefined): number {
  if (offset === undefined || !Number.isFinite(offset)) return 0;
  return Math.max(0, Math.trunc(offset));
}

/** Escape LIKE wildcards so the query matches literally. */
const likePattern = (query: string): string =>
  `%${query.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;

interface MessageRow {
  message_id: number;
  channel_id: string;
  message_text: string;
  media_date: string | null;
  has_image: number | null;
}

/** Create a warehouse repository for the given database connection. */
export function createWarehouseRepository(db: Db): WarehouseRepository {
  const markLoaded = db.prepare<[string, RawFileKind, string, number]>(
    'INSERT INTO loaded_files (path, kind, channel, row_count) VALUES (?, ?, ?, ?)',
  );
  const insertMessage = db.prepare<[string, string | null, string]>(
    `INSERT INTO raw_telegram_messages (channel_username, message_date, message_data)
     VALUES (?, ?, ?)`,
  );
  const insertMedia = db.prepare<[string, string | null, string]>(
    `INSERT INTO raw_telegram_media (channel_username, media_date, media_data)
     VALUES (?, ?, ?)`,
  );

  const loadMessages = db.transaction(
    (path: string, channel: string, messages: RawMessage[]): number => {
      for (const message of messages) {
        insertMessage.run(channel, message.date ?? null, JSON.stringify(message));
      }
      markLoaded.run(path, 'messages', channel, messages.length);
      return messages.length;
    },
  );

  const loadMedia = db.transaction(
    (
      path: string,
      channel: string,
      items: Array<{ media: MediaPayload; raw: unknown }>,
    ): number => {
      for (const { media, raw } of items) {
        insertMedia.run(channel, media.date, JSON.stringify(raw));
      }
      markLoaded.run(path, 'media', channel, items.length);
      return items.length;
    },
  );

  return {
    isLoaded(path): boolean {
      return (
        db
          .prepare<[string], { path: string }>(
            'SELECT path FROM loaded_files WHERE path = ?',
          )
          .get(path) !== undefined
      );
    },

    loadMessages,
    loadMedia,

    resolveChannel(idOrUsername, configured): string | null {
      for (const username of configured) {
        const id = channelId(username);
        if (idOrUsername === username || idOrUsername === id) return id;
      }

      const stored = db.prepare<[string, string], { channel_id: string }>(
        'SELECT channel_id FROM fct_messages WHERE channel_id IN (?, ?) LIMIT 1',
      );
      return stored.get(idOrUsername, channelId(idOrUsername))?.channel_id ?? null;
    },

    getChannelActivity(id): ChannelActivity[] {
      return db
        .prepare<[string], ChannelActivity>(
          `SELECT DATE(media_date) AS date, COUNT(*) AS message_count
           FROM fct_messages
           WHERE channel_id = ? AND media_date IS NOT NULL
           GROUP BY DATE(media_date)
           ORDER BY DATE(media_date)`,
        )
        .all(id);
    },

    searchMessages(query, limit, offset): SearchPage {
      const pattern = likePattern(query);
      const where = `WHERE message_text IS NOT NULL AND message_text LIKE ? ESCAPE '\\'`;

      const total = db
        .prepare<[string], { count: number }>(
          `SELECT COUNT(*) AS count FROM fct_messages ${where}`,
        )
        .get(pattern);

      const rows = db
        .prepare<[string, number, number], MessageRow>(
          `SELECT message_id, channel_id, message_text, media_date, has_image
           FROM fct_messages ${where}
           ORDER BY media_date DESC, message_id DESC
           LIMIT ? OFFSET ?`,
        )
        .all(pattern, clampLimit(limit), clampOffset(offset));

      return {
        count: total?.count ?? 0,
        results: rows.map((row) => ({
          ...row,
          has_image: row.has_image === null ? null : row.has_image !== 0,
        })),
      };
    },
  };
}
