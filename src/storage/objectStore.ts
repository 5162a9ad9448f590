import type { Readable } from 'stream';
import type { ObjectDescriptor } from '../types.js';

/**
 * The two capabilities the sweep needs from a bucket-style store.
 * Authentication is the implementation's concern.
 */
export interface ObjectStore {
  /** Every object under `prefix`, across all pages, in store order. */
  list(bucket: string, prefix: string): AsyncIterable<ObjectDescriptor>;
  /** The object's full content as a byte stream. */
  get(bucket: string, key: string): Promise<Readable>;
}
