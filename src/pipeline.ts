import fs from 'fs/promises';
import path from 'path';
import type { Logger } from './logger.js';
import type { ObjectStore } from './storage/objectStore.js';
import type { ResultSink } from './resultSink.js';
import type { ScanPool } from './worker/scanPool.js';
import type { ObjectDescriptor, PipelineResult, SweepSummary, TimeWindow } from './types.js';
import { listObjectsInWindow } from './lister.js';
import { fetchObject } from './fetcher.js';
import { expandArchive } from './plugins/archives.js';
import { scanFileForSecrets } from './scanner.js';
import { describeError } from './errorHandling.js';
import { getErrorMessage } from './types/errors.js';

export type SweepOptions = {
  bucket: string;
  prefix: string;
  window: TimeWindow;
  downloadDir: string;
  /** Max object pipelines in flight (default 8) */
  concurrency?: number;
};

export type SweepDeps = {
  store: ObjectStore;
  pool: ScanPool;
  sink: ResultSink;
  logger: Logger;
  /** Called as each object's pipeline settles */
  onResult?: (result: PipelineResult) => void;
};

export const DEFAULT_CONCURRENCY = 8;

/** Local name for a downloaded object: its key's last path segment. */
export function scratchName(key: string): string {
  const base = path.posix.basename(key);
  return base && base !== '.' && base !== '..' ? base : 'object';
}

async function removeScratch(target: string, logger: Logger, opts: { recursive?: boolean } = {}): Promise<boolean> {
  try {
    await fs.rm(target, { recursive: !!opts.recursive, force: !!opts.recursive });
    logger.debug(`Removed ${target}`);
    return true;
  } catch (err) {
    logger.warning(`Could not remove ${target}`, describeError(err));
    return false;
  }
}

/**
 * One object's pipeline: fetch, scan the download, expand it, scan and delete
 * each extracted file in turn, then delete the download. Failures stay inside
 * the returned result; only an unusable download directory rejects.
 */
export async function processObject(
  obj: ObjectDescriptor,
  options: Pick<SweepOptions, 'bucket' | 'downloadDir'>,
  deps: SweepDeps,
): Promise<PipelineResult> {
  const { logger } = deps;
  const ctx = { pool: deps.pool, sink: deps.sink, logger };
  const result: PipelineResult = { key: obj.key, fetched: false, scans: 0, findings: 0, errors: [] };
  // private per object so keys sharing a basename never collide
  const workDir = await fs.mkdtemp(path.join(options.downloadDir, 'obj-'));
  const localPath = path.join(workDir, scratchName(obj.key));

  const scan = async (filePath: string) => {
    try {
      const outcome = await scanFileForSecrets(filePath, obj.key, ctx);
      result.scans++;
      result.findings += outcome.recorded ? 1 : 0;
    } catch (err) {
      result.errors.push(getErrorMessage(err));
      logger.error(`Scan failed for ${filePath}`, { key: obj.key, ...describeError(err) });
    }
  };

  try {
    logger.info(`Starting download of ${obj.key}`);
    try {
      await fetchObject(deps.store, options.bucket, obj.key, localPath);
    } catch (err) {
      result.errors.push(getErrorMessage(err));
      logger.error(`Download failed for ${obj.key}`, describeError(err));
      return result;
    }
    result.fetched = true;
    logger.info(`Completed download of ${obj.key}`);

    await scan(localPath);

    let extracted: string[] = [];
    try {
      extracted = await expandArchive(localPath, logger);
    } catch (err) {
      result.errors.push(getErrorMessage(err));
      logger.error(`Expansion failed for ${obj.key}`, describeError(err));
    }
    for (const member of extracted) {
      await scan(member);
      await removeScratch(member, logger);
    }

    await removeScratch(localPath, logger);
    return result;
  } finally {
    // sweeps partial downloads and zip extraction directories
    await removeScratch(workDir, logger, { recursive: true });
  }
}

/**
 * Streams the lister's output into at most `concurrency` concurrent object
 * pipelines and drives all of them to completion. A listing error stops new
 * pipelines from starting and is rethrown once in-flight ones settle.
 */
export async function runSweep(options: SweepOptions, deps: SweepDeps): Promise<SweepSummary> {
  const { logger } = deps;
  const summary: SweepSummary = { listed: 0, processed: 0, failed: 0, scans: 0, findings: 0 };
  const conc = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY));
  const objects = listObjectsInWindow(deps.store, options.bucket, options.prefix, options.window);
  let listingError: unknown;

  async function worker() {
    while (listingError === undefined) {
      let next: IteratorResult<ObjectDescriptor>;
      try {
        next = await objects.next();
      } catch (err) {
        listingError = err;
        break;
      }
      if (next.done) break;
      summary.listed++;
      let result: PipelineResult;
      try {
        result = await processObject(next.value, options, deps);
      } catch (err) {
        result = { key: next.value.key, fetched: false, scans: 0, findings: 0, errors: [getErrorMessage(err)] };
        logger.error(`Pipeline for ${next.value.key} aborted`, describeError(err));
      }
      summary.processed++;
      summary.scans += result.scans;
      summary.findings += result.findings;
      if (result.errors.length) summary.failed++;
      deps.onResult?.(result);
    }
  }

  await Promise.all(Array.from({ length: conc }, () => worker()));
  await deps.sink.flush();
  if (listingError !== undefined) throw listingError;
  return summary;
}
