import type { Logger } from './logger.js';
import type { ResultSink } from './resultSink.js';
import type { ScanPool } from './worker/scanPool.js';
import type { ScanOutcome } from './types.js';
import { countFindings, parseDetectorReport } from './detector.js';

export type ScanContext = {
  pool: ScanPool;
  sink: ResultSink;
  logger: Logger;
};

/**
 * Runs the detector on one local file through the pool. A non-empty report
 * becomes exactly one record in the sink, tagged with the object key it came
 * from. Detector and protocol failures reject; they are never read as
 * "no secrets".
 */
export async function scanFileForSecrets(filePath: string, key: string, ctx: ScanContext): Promise<ScanOutcome> {
  ctx.logger.info(`Running secret scan on ${filePath}`, { key });
  const stdout = await ctx.pool.submit(filePath);
  const report = parseDetectorReport(stdout, filePath);
  const findingCount = countFindings(report);
  if (Object.keys(report.results).length === 0) {
    ctx.logger.info(`No secrets in ${key}`, { file: filePath });
    return { filePath, key, findingCount: 0, recorded: false };
  }
  ctx.logger.warning(`Secret found in ${key}`, { file: filePath, findings: findingCount, files: Object.keys(report.results) });
  await ctx.sink.record({ sourceFile: filePath, key, results: report.results });
  return { filePath, key, findingCount, recorded: true };
}
