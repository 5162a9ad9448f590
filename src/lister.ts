import type { ObjectStore } from './storage/objectStore.js';
import type { ObjectDescriptor, TimeWindow } from './types.js';
import { getErrorMessage, ListingError } from './types/errors.js';

export function inWindow(lastModified: Date, window: TimeWindow): boolean {
  const t = lastModified.getTime();
  return window.start.getTime() <= t && t <= window.end.getTime();
}

/**
 * Lazily yields the objects under `prefix` whose last-modified time falls in
 * `window` (both bounds inclusive). Re-lists on every call; storage errors
 * surface as `ListingError` without retry.
 */
export async function* listObjectsInWindow(
  store: ObjectStore,
  bucket: string,
  prefix: string,
  window: TimeWindow,
): AsyncGenerator<ObjectDescriptor> {
  const it = store.list(bucket, prefix)[Symbol.asyncIterator]();
  while (true) {
    let next: IteratorResult<ObjectDescriptor>;
    try {
      next = await it.next();
    } catch (err) {
      throw new ListingError(`Listing s3://${bucket}/${prefix} failed: ${getErrorMessage(err)}`, { cause: err });
    }
    if (next.done) return;
    if (inWindow(next.value.lastModified, window)) yield next.value;
  }
}
