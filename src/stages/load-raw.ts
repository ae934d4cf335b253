/**
 * Builtin `load-raw` stage. Ingests the scraper's JSON files from raw storage
 * into the warehouse raw tables. Files already recorded in `loaded_files` are
 * skipped, so re-running the stage is safe.
 *
 * @module
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { basename, join, sep } from 'node:path';

import { closeConnection, createConnection } from '../db/connection.js';
import { runMigrations } from '../db/migrations.js';
import { failure, type Stage, type StageReport, success } from '../pipeline/stage.js';
import type { BuiltinStageDefinition } from '../schemas/pipeline.js';
import { decodeMediaFile, decodeMessagesFile } from '../warehouse/media.js';
import { WAREHOUSE_MIGRATIONS } from '../warehouse/migrations.js';
import {
  createWarehouseRepository,
  type RawFileKind,
} from '../warehouse/repository.js';

const MESSAGES_FILE = /^messages_.*\.json$/;
const MEDIA_FILE = /^media_info_.*\.json$/;
const DATE_DIR = /^\d{4}-\d{2}-\d{2}$/;

/** Counts reported as the stage's output data. */
export interface LoadSummary {
  files: number;
  alreadyLoaded: number;
  messages: number;
  media: number;
  mediaByType: Record<string, number>;
}

/** A raw file discovered under the data directory. */
export interface RawFile {
  /** Path relative to the data directory, with `/` separators. */
  path: string;
  kind: RawFileKind;
  channel: string;
}

/**
 * Channel a raw file belongs to. Files are laid out as
 * `.../YYYY-MM-DD/<channel>/<file>.json`; otherwise the parent directory wins.
 */
export function channelFromPath(relativePath: string): string {
  const parts = relativePath.split('/');
  const dateIndex = parts.findIndex((part) => DATE_DIR.test(part));
  if (dateIndex !== -1 && dateIndex + 2 < parts.length) {
    return parts[dateIndex + 1];
  }
  return parts.length > 1 ? parts[parts.length - 2] : 'unknown';
}

/** List raw files under `dataDir`, sorted by path. */
export function discoverRawFiles(dataDir: string): RawFile[] {
  if (!existsSync(dataDir)) return [];

  const files: RawFile[] = [];
  for (const entry of readdirSync(dataDir, {
    encoding: 'utf-8',
    recursive: true,
  })) {
    const path = entry.split(sep).join('/');
    const name = basename(path);
    const kind: RawFileKind | null = MESSAGES_FILE.test(name)
      ? 'messages'
      : MEDIA_FILE.test(name)
        ? 'media'
        : null;
    if (kind) files.push({ path, kind, channel: channelFromPath(path) });
  }
  return files.sort((a, b) => a.path.localeCompare(b.path));
}

/** Create the `load-raw` stage. Requires the `database` and `raw-storage` resources. */
export function createLoadRawStage(definition: BuiltinStageDefinition): Stage {
  const frozen = Object.freeze({ ...definition });

  return {
    definition: frozen,

    async run(_input, resources, context): Promise<StageReport> {
      const database = resources.database;
      const rawStorage = resources['raw-storage'];
      if (!database || !rawStorage) {
        return {
          outcome: failure(
            'fatal',
            'load-raw requires the database and raw-storage resources',
          ),
        };
      }

      const logger = context.logger.child({ stage: frozen.name });
      const files = discoverRawFiles(rawStorage.dataDir);
      const summary: LoadSummary = {
        files: 0,
        alreadyLoaded: 0,
        messages: 0,
        media: 0,
        mediaByType: {},
      };

      const db = createConnection({ dbPath: database.path });
      try {
        runMigrations(db, WAREHOUSE_MIGRATIONS);
        const warehouse = createWarehouseRepository(db);

        for (const file of files) {
          if (context.signal.aborted) {
            return { outcome: failure('cancelled', 'Load cancelled') };
          }
          if (warehouse.isLoaded(file.path)) {
            summary.alreadyLoaded += 1;
            continue;
          }

          const content: unknown = JSON.parse(
            readFileSync(join(rawStorage.dataDir, file.path), 'utf-8'),
          );

          if (file.kind === 'messages') {
            summary.messages += warehouse.loadMessages(
              file.path,
              file.channel,
              decodeMessagesFile(content),
            );
          } else {
            const items = decodeMediaFile(content);
            for (const { media } of items) {
              summary.mediaByType[media.type] =
                (summary.mediaByType[media.type] ?? 0) + 1;
            }
            summary.media += warehouse.loadMedia(file.path, file.channel, items);
          }
          summary.files += 1;
          logger.debug({ file: file.path, channel: file.channel }, 'Loaded raw file');
        }
      } finally {
        closeConnection(db);
      }

      logger.info(summary, 'Raw load complete');
      return { outcome: success(summary) };
    },
  };
}
