import fs from 'fs';
import { pipeline } from 'stream/promises';
import type { ObjectStore } from './storage/objectStore.js';
import { FetchError, getErrorMessage } from './types/errors.js';

// bytes buffered per write; large objects never sit in memory whole
export const FETCH_CHUNK_BYTES = 64 * 1024;

/**
 * Streams `s3://bucket/key` into `destPath`, overwriting it. Resolves once the
 * source is drained and the file is flushed. A failure mid-stream can leave a
 * partial file behind for the caller to remove.
 */
export async function fetchObject(store: ObjectStore, bucket: string, key: string, destPath: string): Promise<void> {
  try {
    const body = await store.get(bucket, key);
    await pipeline(body, fs.createWriteStream(destPath, { flags: 'w', highWaterMark: FETCH_CHUNK_BYTES }));
  } catch (err) {
    throw new FetchError(key, `Download of ${key} failed: ${getErrorMessage(err)}`, { cause: err });
  }
}
