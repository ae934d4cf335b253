/**
 * Decoding of the scraper's raw JSON. Media records arrive with optional,
 * type-dependent attributes; they are decoded once into a tagged variant so
 * nothing downstream probes for fields.
 *
 * @module
 */

import { z } from 'zod';

/** Telegram ids and access hashes can exceed the safe integer range and may arrive as strings. */
const bigId = z.union([z.number(), z.string()]);

const rawMediaSchema = z.object({
  message_id: z.number().int(),
  date: z.string().nullable().optional(),
  media_type: z.string().optional(),
  media_id: bigId.optional(),
  access_hash: bigId.optional(),
  mime_type: z.string().nullable().optional(),
  file_size: z.number().nullable().optional(),
  file_name: z.string().nullable().optional(),
  file_path: z.string().nullable().optional(),
  download_success: z.boolean().optional(),
});

/** Fields common to every media variant. */
interface MediaBase {
  messageId: number;
  date: string | null;
}

/** Attributes of downloaded media. */
interface StoredMedia extends MediaBase {
  mediaId: number | string | null;
  accessHash: number | string | null;
  filePath: string | null;
  downloaded: boolean;
}

interface FileAttributes {
  mimeType: string | null;
  fileSize: number | null;
  fileName: string | null;
}

export type MediaPayload =
  | ({ type: 'photo' } & StoredMedia)
  | ({ type: 'document' } & StoredMedia & FileAttributes)
  | ({ type: 'video' } & StoredMedia & FileAttributes)
  | ({ type: 'none' } & MediaBase);

export type RawMedia = z.infer<typeof rawMediaSchema>;

/** Decode one raw media record. Throws ZodError when the record is malformed. */
export function decodeMedia(value: unknown): MediaPayload {
  const raw = rawMediaSchema.parse(value);
  const base: MediaBase = { messageId: raw.message_id, date: raw.date ?? null };
  const stored: StoredMedia = {
    ...base,
    mediaId: raw.media_id ?? null,
    accessHash: raw.access_hash ?? null,
    filePath: raw.file_path ?? null,
    downloaded: raw.download_success ?? false,
  };
  const file: FileAttributes = {
    mimeType: raw.mime_type ?? null,
    fileSize: raw.file_size ?? null,
    fileName: raw.file_name ?? null,
  };

  switch (raw.media_type) {
    case 'photo':
      return { type: 'photo', ...stored };
    case 'document':
      return { type: 'document', ...stored, ...file };
    case 'video':
      return { type: 'video', ...stored, ...file };
    default:
      return { type: 'none', ...base };
  }
}

const rawMessageSchema = z
  .object({
    id: bigId.optional(),
    date: z.string().nullable().optional(),
  })
  .passthrough();

/**
 * A messages file is either a bare array or an envelope with a `messages`
 * array.
 */
const messagesFileSchema = z.union([
  z.array(rawMessageSchema),
  z.object({ messages: z.array(rawMessageSchema) }).transform((f) => f.messages),
]);

const mediaFileSchema = z.array(z.unknown());

export type RawMessage = z.infer<typeof rawMessageSchema>;

/** Decode the contents of a `messages_*.json` file. */
export function decodeMessagesFile(value: unknown): RawMessage[] {
  return messagesFileSchema.parse(value);
}

/** Decode the contents of a `media_info_*.json` file. */
export function decodeMediaFile(
  value: unknown,
): Array<{ media: MediaPayload; raw: unknown }> {
  return mediaFileSchema
    .parse(value)
    .map((raw) => ({ media: decodeMedia(raw), raw }));
}
