/**
 * Tests for raw record decoding.
 */

import { describe, expect, it } from 'vitest';

import { decodeMedia, decodeMediaFile, decodeMessagesFile } from './media.js';

describe('decodeMedia', () => {
  it('should decode a downloaded photo', () => {
    expect(
      decodeMedia({
        message_id: 10,
        date: '2024-01-15T08:00:00+00:00',
        media_type: 'photo',
        media_id: '5012345678901234567',
        access_hash: -42,
        file_path: 'images/test_channel_a/10.jpg',
        download_success: true,
      }),
    ).toEqual({
      type: 'photo',
      messageId: 10,
      date: '2024-01-15T08:00:00+00:00',
      mediaId: '5012345678901234567',
      accessHash: -42,
      filePath: 'images/test_channel_a/10.jpg',
      downloaded: true,
    });
  });

  it('should carry file attributes for documents', () => {
    expect(
      decodeMedia({
        message_id: 11,
        media_type: 'document',
        mime_type: 'application/pdf',
        file_size: 2048,
        file_name: 'price-list.pdf',
      }),
    ).toEqual({
      type: 'document',
      messageId: 11,
      date: null,
      mediaId: null,
      accessHash: null,
      filePath: null,
      downloaded: false,
      mimeType: 'application/pdf',
      fileSize: 2048,
      fileName: 'price-list.pdf',
    });
  });

  it('should map unknown media types to none', () => {
    expect(decodeMedia({ message_id: 12, media_type: 'webpage' })).toEqual({
      type: 'none',
      messageId: 12,
      date: null,
    });
  });

  it('should reject records without a message id', () => {
    expect(() => decodeMedia({ media_type: 'photo' })).toThrow();
  });
});

describe('raw files', () => {
  it('should accept bare and enveloped message arrays', () => {
    const messages = [{ id: 1, date: '2024-01-15T08:00:00', text: 'hello' }];

    expect(decodeMessagesFile(messages)).toEqual(messages);
    expect(decodeMessagesFile({ messages })).toEqual(messages);
  });

  it('should keep the raw media record beside its decoded form', () => {
    const raw = { message_id: 5, media_type: 'video', extra: 'kept' };

    const [item] = decodeMediaFile([raw]);

    expect(item?.raw).toBe(raw);
    expect(item?.media.type).toBe('video');
  });

  it('should reject a media file that is not an array', () => {
    expect(() => decodeMediaFile({ media: [] })).toThrow();
  });
});
