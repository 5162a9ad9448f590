import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath } from 'url';
import { countFindings, createDetectorRunner, parseDetectorReport } from '../src/detector.js';
import { ScanExecutionError, ScanProtocolError } from '../src/types/errors.js';
import { makeTmpDir } from './helpers/tmp.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/fake-detector.mjs', import.meta.url));

describe('parseDetectorReport', () => {
  it('accepts a report with findings and keeps extra fields', () => {
    const stdout = JSON.stringify({
      version: '1.5.0',
      results: { 'a.txt': [{ type: 'AWS Access Key', line_number: 3 }, { type: 'Secret Keyword', line_number: 9 }] },
    });
    const report = parseDetectorReport(stdout, 'a.txt');
    expect(report.version).toBe('1.5.0');
    expect(countFindings(report)).toBe(2);
  });

  it('accepts an empty results mapping', () => {
    const report = parseDetectorReport('{"results": {}}', 'a.txt');
    expect(report.results).toEqual({});
    expect(countFindings(report)).toBe(0);
  });

  it('rejects output that is not JSON', () => {
    expect(() => parseDetectorReport('Traceback (most recent call last)', 'a.txt')).toThrow(ScanProtocolError);
    expect(() => parseDetectorReport('', 'a.txt')).toThrow(/is not JSON/);
  });

  it('rejects reports without a results mapping', () => {
    expect(() => parseDetectorReport('{"version": "1"}', 'a.txt')).toThrow(/results: Required/);
    expect(() => parseDetectorReport('{"results": []}', 'a.txt')).toThrow(ScanProtocolError);
    expect(() => parseDetectorReport('{"results": {"a.txt": "oops"}}', 'a.txt')).toThrow(ScanProtocolError);
    expect(() => parseDetectorReport('[1, 2]', 'a.txt')).toThrow(ScanProtocolError);
  });
});

describe('createDetectorRunner', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await makeTmpDir('detector');
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('runs the detector as a subprocess with the file path last', async () => {
    const file = path.join(dir, 'app.log');
    await fs.writeFile(file, 'ok\npassword=test-secret\n');
    const run = createDetectorRunner({ command: process.execPath, args: [FIXTURE, 'scan'] });
    const report = parseDetectorReport(await run(file), file);
    expect(Object.keys(report.results)).toEqual([file]);
    expect(report.results[file]).toEqual([
      { type: 'Secret Keyword', filename: file, hashed_secret: 'placeholder-hash', is_verified: false, line_number: 2 },
    ]);
  });

  it('surfaces garbage output as a protocol error, not as a clean scan', async () => {
    const file = path.join(dir, 'clean.log');
    await fs.writeFile(file, 'nothing here');
    const run = createDetectorRunner({ command: process.execPath, args: [FIXTURE, 'garbage'] });
    const stdout = await run(file);
    expect(() => parseDetectorReport(stdout, file)).toThrow(ScanProtocolError);
  });

  it('reports a missing executable', async () => {
    const run = createDetectorRunner({ command: 'logsweep-no-such-detector-binary' });
    await expect(run('/tmp/whatever')).rejects.toThrow(/not found on PATH/);
  });

  it('reports a non-zero exit', async () => {
    const run = createDetectorRunner({ command: process.execPath, args: [FIXTURE, 'unknown-mode'] });
    await expect(run('/tmp/whatever')).rejects.toBeInstanceOf(ScanExecutionError);
  });

  it('kills a detector that outlives the timeout', async () => {
    const run = createDetectorRunner({ command: process.execPath, args: [FIXTURE, 'hang'], timeoutMs: 300 });
    await expect(run('/tmp/whatever')).rejects.toThrow(/timed out after 300ms/);
  });
});
