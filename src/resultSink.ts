import fs from 'fs/promises';
import type { ResultsFormat, ScanFinding } from './types.js';

export function formatFinding(finding: ScanFinding, format: ResultsFormat = 'text'): string {
  if (format === 'ndjson') {
    const record = {
      ts: new Date().toISOString(),
      key: finding.key,
      sourceFile: finding.sourceFile,
      results: finding.results,
    };
    return JSON.stringify(record) + '\n';
  }
  const body = JSON.stringify({ key: finding.key, results: finding.results });
  return `Secrets scan result for ${finding.sourceFile}:\n${body}\n`;
}

/**
 * Append-only results file shared by every pipeline. Each finding is written
 * with a single append, and appends are chained so two records never
 * interleave even when many pipelines finish together.
 */
export class ResultSink {
  private tail: Promise<void> = Promise.resolve();
  private written = 0;

  constructor(
    readonly filePath: string,
    readonly format: ResultsFormat = 'text',
  ) {}

  /** Creates the file if absent without truncating it. */
  async open(): Promise<void> {
    const handle = await fs.open(this.filePath, 'a');
    await handle.close();
  }

  record(finding: ScanFinding): Promise<void> {
    const block = formatFinding(finding, this.format);
    const next = this.tail.then(() => fs.appendFile(this.filePath, block, 'utf8'));
    // keep the chain alive after a failed append; the caller still gets the rejection
    this.tail = next.then(
      () => { this.written++; },
      () => undefined,
    );
    return next;
  }

  /** Resolves once every queued append has settled. */
  flush(): Promise<void> {
    return this.tail;
  }

  get count(): number {
    return this.written;
  }
}
