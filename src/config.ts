import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { parseLogLevel, type LogLevel } from './logger.js';
import { DEFAULT_DETECTOR_ARGS, DEFAULT_DETECTOR_COMMAND } from './detector.js';
import { defaultPoolSize } from './worker/scanPool.js';
import { DEFAULT_CONCURRENCY } from './pipeline.js';
import type { ResultsFormat, TimeWindow } from './types.js';
import { ConfigError, getErrorMessage } from './types/errors.js';

export const CONFIG_FILE_NAMES = ['.logsweep.yaml', '.logsweep.yml', '.logsweep.json'];

const TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;

/**
 * Parses `YYYY-MM-DDTHH:MM:SS` as UTC. Zone suffixes, fractional seconds and
 * dates that do not exist (Feb 30, hour 24) are rejected.
 */
export function parseUtcTimestamp(value: string, label = 'timestamp'): Date {
  if (!TIMESTAMP_RE.test(value)) {
    throw new ConfigError(`Invalid ${label} '${value}': expected YYYY-MM-DDTHH:MM:SS (UTC, no zone suffix)`);
  }
  const d = new Date(`${value}Z`);
  if (Number.isNaN(d.getTime()) || d.toISOString().slice(0, 19) !== value) {
    throw new ConfigError(`Invalid ${label} '${value}': no such date/time`);
  }
  return d;
}

export function parseTimeWindow(start: string, end: string): TimeWindow {
  const window = { start: parseUtcTimestamp(start, 'start time'), end: parseUtcTimestamp(end, 'end time') };
  if (window.start.getTime() > window.end.getTime()) {
    throw new ConfigError(`Start time ${start} is after end time ${end}`);
  }
  return window;
}

const LogLevelSchema = z.string().transform((value, ctx) => {
  const level = parseLogLevel(value);
  if (!level) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level '${value}' (use DEBUG, INFO, WARNING, ERROR or CRITICAL)` });
    return z.NEVER;
  }
  return level;
});

const ResultsFormatSchema = z.enum(['text', 'ndjson']);

const FileConfigSchema = z
  .object({
    profile: z.string().min(1).optional(),
    region: z.string().min(1).optional(),
    logLevel: LogLevelSchema.optional(),
    logJson: z.boolean().optional(),
    concurrency: z.number().int().positive().optional(),
    scanWorkers: z.number().int().positive().optional(),
    scanTimeoutMs: z.number().int().nonnegative().optional(),
    resultsFormat: ResultsFormatSchema.optional(),
    detector: z
      .object({
        command: z.string().min(1).optional(),
        args: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof FileConfigSchema>;

// commander hands over strings for valued options
const CliOptionsSchema = z.object({
  profile: z.string().min(1).optional(),
  region: z.string().min(1).optional(),
  logLevel: LogLevelSchema.optional(),
  logJson: z.boolean().optional(),
  config: z.string().min(1).optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  scanWorkers: z.coerce.number().int().positive().optional(),
  scanTimeout: z.coerce.number().int().nonnegative().optional(),
  detector: z.string().min(1).optional(),
  detectorArg: z.array(z.string()).optional(),
  resultsFormat: ResultsFormatSchema.optional(),
  metrics: z.string().min(1).optional(),
  failOnFindings: z.boolean().optional(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export type SweepConfig = {
  bucket: string;
  prefix: string;
  window: TimeWindow;
  downloadDir: string;
  resultsFile: string;
  profile?: string;
  region?: string;
  logLevel: LogLevel;
  logJson: boolean;
  concurrency: number;
  scanWorkers: number;
  scanTimeoutMs: number;
  resultsFormat: ResultsFormat;
  detector: { command: string; args: string[] };
  metricsPath?: string;
  failOnFindings: boolean;
  configFile?: string;
};

function describeIssues(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join(', ');
}

export function parseCliOptions(raw: unknown): CliOptions {
  const parsed = CliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid option: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

async function exists(p: string) {
  try { await fs.stat(p); return true; } catch { return false; }
}

/**
 * Loads the config file named by `explicitPath`, or the first of
 * `.logsweep.yaml`, `.logsweep.yml`, `.logsweep.json` found in `baseDir`.
 */
export async function loadFileConfig(explicitPath?: string, baseDir?: string): Promise<{ config: FileConfig; source?: string }> {
  let source: string | undefined;
  if (explicitPath) {
    source = path.resolve(explicitPath);
    if (!(await exists(source))) {
      throw new ConfigError(`Config file ${source} not found`);
    }
  } else {
    const cwd = baseDir || process.cwd();
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(cwd, name);
      if (await exists(candidate)) {
        source = candidate;
        break;
      }
    }
  }
  if (!source) return { config: {} };

  let data: unknown;
  try {
    const text = await fs.readFile(source, 'utf8');
    data = source.toLowerCase().endsWith('.json') ? JSON.parse(text) : yaml.load(text);
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${source}: ${getErrorMessage(err)}`, { cause: err });
  }
  const parsed = FileConfigSchema.safeParse(data ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${source}: ${describeIssues(parsed.error)}`);
  }
  return { config: parsed.data, source };
}

/** CLI options win over the config file, which wins over defaults. */
export function resolveSweepConfig(
  positional: { bucket: string; prefix: string; start: string; end: string; downloadDir: string; resultsFile: string },
  cli: CliOptions,
  file: FileConfig = {},
): SweepConfig {
  if (!positional.bucket) throw new ConfigError('Bucket name must not be empty');
  return {
    bucket: positional.bucket,
    prefix: positional.prefix,
    window: parseTimeWindow(positional.start, positional.end),
    downloadDir: path.resolve(positional.downloadDir),
    resultsFile: path.resolve(positional.resultsFile),
    profile: cli.profile ?? file.profile,
    region: cli.region ?? file.region,
    logLevel: cli.logLevel ?? file.logLevel ?? 'warning',
    logJson: cli.logJson ?? file.logJson ?? false,
    concurrency: cli.concurrency ?? file.concurrency ?? DEFAULT_CONCURRENCY,
    scanWorkers: cli.scanWorkers ?? file.scanWorkers ?? defaultPoolSize(),
    scanTimeoutMs: cli.scanTimeout ?? file.scanTimeoutMs ?? 0,
    resultsFormat: cli.resultsFormat ?? file.resultsFormat ?? 'text',
    detector: {
      command: cli.detector ?? file.detector?.command ?? DEFAULT_DETECTOR_COMMAND,
      args: cli.detectorArg ?? file.detector?.args ?? [...DEFAULT_DETECTOR_ARGS],
    },
    metricsPath: cli.metrics ? path.resolve(cli.metrics) : undefined,
    failOnFindings: cli.failOnFindings ?? false,
  };
}

/** The download directory must already exist and be writable. */
export async function checkDownloadDir(dir: string): Promise<void> {
  let isDir: boolean;
  try {
    isDir = (await fs.stat(dir)).isDirectory();
  } catch (err) {
    throw new ConfigError(`Download directory ${dir} does not exist`, { cause: err });
  }
  if (!isDir) {
    throw new ConfigError(`Download directory ${dir} is not a directory`);
  }
  try {
    await fs.access(dir, fsConstants.W_OK);
  } catch (err) {
    throw new ConfigError(`Download directory ${dir} is not writable`, { cause: err });
  }
}
