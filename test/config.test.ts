import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import path from 'path';
import {
  checkDownloadDir,
  loadFileConfig,
  parseCliOptions,
  parseTimeWindow,
  parseUtcTimestamp,
  resolveSweepConfig,
} from '../src/config.js';
import { ConfigError } from '../src/types/errors.js';
import { makeTmpDir } from './helpers/tmp.js';

const positional = {
  bucket: 'logs-bucket',
  prefix: 'app/',
  start: '2024-03-01T00:00:00',
  end: '2024-03-02T00:00:00',
  downloadDir: '/tmp/dl',
  resultsFile: '/tmp/results.txt',
};

describe('timestamps', () => {
  it('parses YYYY-MM-DDTHH:MM:SS as UTC', () => {
    const d = parseUtcTimestamp('2024-03-01T12:34:56');
    expect(d.toISOString()).toBe('2024-03-01T12:34:56.000Z');
  });

  it('rejects zone suffixes and other formats', () => {
    expect(() => parseUtcTimestamp('2024-03-01T12:34:56Z')).toThrow(ConfigError);
    expect(() => parseUtcTimestamp('2024-03-01T12:34:56+02:00')).toThrow(ConfigError);
    expect(() => parseUtcTimestamp('2024-03-01 12:34:56')).toThrow(ConfigError);
    expect(() => parseUtcTimestamp('2024-03-01')).toThrow(ConfigError);
  });

  it('rejects dates that do not exist', () => {
    expect(() => parseUtcTimestamp('2023-02-29T00:00:00')).toThrow(/no such date/);
    expect(() => parseUtcTimestamp('2024-01-01T24:00:00')).toThrow(ConfigError);
  });

  it('builds a window and refuses start after end', () => {
    const w = parseTimeWindow('2024-03-01T00:00:00', '2024-03-01T00:00:00');
    expect(w.start.getTime()).toBe(w.end.getTime());
    expect(() => parseTimeWindow('2024-03-02T00:00:00', '2024-03-01T00:00:00')).toThrow(/after end time/);
  });
});

describe('option resolution', () => {
  it('applies defaults', () => {
    const cfg = resolveSweepConfig(positional, parseCliOptions({}), {});
    expect(cfg.logLevel).toBe('warning');
    expect(cfg.concurrency).toBe(8);
    expect(cfg.scanTimeoutMs).toBe(0);
    expect(cfg.resultsFormat).toBe('text');
    expect(cfg.detector).toEqual({ command: 'detect-secrets', args: ['scan'] });
    expect(cfg.failOnFindings).toBe(false);
    expect(cfg.scanWorkers).toBeGreaterThanOrEqual(1);
    expect(cfg.window.start.toISOString()).toBe('2024-03-01T00:00:00.000Z');
  });

  it('prefers CLI options over the config file', () => {
    const cli = parseCliOptions({ logLevel: 'DEBUG', concurrency: '3', detector: 'my-detector' });
    const cfg = resolveSweepConfig(positional, cli, {
      logLevel: 'error',
      concurrency: 20,
      scanWorkers: 2,
      detector: { command: 'file-detector', args: ['scan', '--all-files'] },
    });
    expect(cfg.logLevel).toBe('debug');
    expect(cfg.concurrency).toBe(3);
    expect(cfg.scanWorkers).toBe(2);
    expect(cfg.detector).toEqual({ command: 'my-detector', args: ['scan', '--all-files'] });
  });

  it('accepts log levels case-insensitively', () => {
    expect(parseCliOptions({ logLevel: 'Warning' }).logLevel).toBe('warning');
    expect(parseCliOptions({ logLevel: 'CRITICAL' }).logLevel).toBe('critical');
  });

  it('rejects invalid option values', () => {
    expect(() => parseCliOptions({ logLevel: 'LOUD' })).toThrow(/Unknown log level 'LOUD'/);
    expect(() => parseCliOptions({ concurrency: '0' })).toThrow(ConfigError);
    expect(() => parseCliOptions({ concurrency: 'many' })).toThrow(ConfigError);
    expect(() => parseCliOptions({ resultsFormat: 'xml' })).toThrow(ConfigError);
  });

  it('rejects an empty bucket', () => {
    expect(() => resolveSweepConfig({ ...positional, bucket: '' }, {}, {})).toThrow(/Bucket name/);
  });
});

describe('config file', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTmpDir('config');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns an empty config when nothing is found', async () => {
    const res = await loadFileConfig(undefined, dir);
    expect(res).toEqual({ config: {} });
  });

  it('discovers .logsweep.yaml in the base directory', async () => {
    const yamlPath = path.join(dir, '.logsweep.yaml');
    await fs.writeFile(
      yamlPath,
      ['logLevel: INFO', 'concurrency: 4', 'resultsFormat: ndjson', 'detector:', '  command: detect-secrets', '  args: [scan, --all-files]'].join('\n'),
    );
    const res = await loadFileConfig(undefined, dir);
    expect(res.source).toBe(yamlPath);
    expect(res.config).toEqual({
      logLevel: 'info',
      concurrency: 4,
      resultsFormat: 'ndjson',
      detector: { command: 'detect-secrets', args: ['scan', '--all-files'] },
    });
  });

  it('loads an explicit JSON file', async () => {
    const jsonPath = path.join(dir, 'sweep.json');
    await fs.writeFile(jsonPath, JSON.stringify({ scanTimeoutMs: 5000, region: 'eu-west-1' }));
    const res = await loadFileConfig(jsonPath);
    expect(res.config).toEqual({ scanTimeoutMs: 5000, region: 'eu-west-1' });
  });

  it('fails on unknown keys and missing explicit files', async () => {
    const jsonPath = path.join(dir, 'bad.json');
    await fs.writeFile(jsonPath, JSON.stringify({ concurency: 4 }));
    await expect(loadFileConfig(jsonPath)).rejects.toThrow(/Invalid config file/);
    await expect(loadFileConfig(path.join(dir, 'missing.yaml'))).rejects.toThrow(/not found/);
  });

  it('fails on unparseable files', async () => {
    const jsonPath = path.join(dir, 'broken.json');
    await fs.writeFile(jsonPath, '{ nope');
    await expect(loadFileConfig(jsonPath)).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('download directory check', () => {
  it('accepts an existing writable directory', async () => {
    const dir = await makeTmpDir('dl-ok');
    await expect(checkDownloadDir(dir)).resolves.toBeUndefined();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('rejects missing paths and plain files', async () => {
    const dir = await makeTmpDir('dl-bad');
    const file = path.join(dir, 'file.txt');
    await fs.writeFile(file, 'x');
    await expect(checkDownloadDir(path.join(dir, 'missing'))).rejects.toThrow(/does not exist/);
    await expect(checkDownloadDir(file)).rejects.toThrow(/is not a directory/);
    await fs.rm(dir, { recursive: true, force: true });
  });
});
