import { Command, CommanderError } from 'commander';
import fs from 'fs/promises';
import { createLogger, type Logger } from './logger.js';
import {
  checkDownloadDir,
  loadFileConfig,
  parseCliOptions,
  resolveSweepConfig,
  type SweepConfig,
} from './config.js';
import { createDetectorRunner, type DetectorRunner } from './detector.js';
import { ScanPool } from './worker/scanPool.js';
import { ResultSink } from './resultSink.js';
import { runSweep } from './pipeline.js';
import { S3ObjectStore } from './storage/s3ObjectStore.js';
import type { ObjectStore } from './storage/objectStore.js';
import { newMetrics, recordPipeline, recordSummary, writeProm } from './metrics.js';
import { describeError } from './errorHandling.js';
import { ConfigError, getErrorMessage, isFatalError } from './types/errors.js';
import type { SweepSummary } from './types.js';

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_PIPELINE_FAILURES = 2;
export const EXIT_FINDINGS = 4;

/** Seams for tests and embedding: swap the store, the detector or the log output. */
export type CliDeps = {
  store?: ObjectStore;
  detector?: DetectorRunner;
  logSink?: (line: string) => void;
  cwd?: string;
};

export type SweepRun = {
  summary: SweepSummary;
  exitCode: number;
};

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

function buildProgram(): Command {
  const program = new Command();
  program
    .name('logsweep')
    .description('Download objects modified within a time window and scan them for leaked secrets')
    .argument('<bucket>', 'bucket to list')
    .argument('<prefix>', 'key prefix to list under (may be empty)')
    .argument('<start>', 'window start, YYYY-MM-DDTHH:MM:SS (UTC)')
    .argument('<end>', 'window end, YYYY-MM-DDTHH:MM:SS (UTC, inclusive)')
    .argument('<downloadDir>', 'existing, writable scratch directory')
    .argument('<resultsFile>', 'results file (created if absent, appended otherwise)')
    .option('-p, --profile <name>', 'AWS shared-config profile (default credential chain otherwise)')
    .option('--region <region>', 'bucket region')
    .option('-l, --log-level <lvl>', 'DEBUG | INFO | WARNING | ERROR | CRITICAL (default WARNING)')
    .option('-j, --log-json', 'emit JSON logs')
    .option('-c, --config <path>', 'config file (default: .logsweep.yaml/.yml/.json in the working directory)')
    .option('--concurrency <n>', 'objects processed at once (default 8)')
    .option('--scan-workers <n>', 'detector processes run at once (default: available parallelism)')
    .option('--scan-timeout <ms>', 'kill a detector run after this many ms (0 = never)')
    .option('--detector <cmd>', 'secret detector executable (default detect-secrets)')
    .option('--detector-arg <arg>', 'detector argument placed before the file path, repeatable (default: scan)', collect)
    .option('--results-format <fmt>', 'text | ndjson (default text)')
    .option('--metrics <path>', 'write Prometheus-format metrics to file at end of run')
    .option('--fail-on-findings', 'exit 4 if any finding was recorded');
  return program;
}

async function readVersion(): Promise<string | undefined> {
  try {
    const pkg: unknown = JSON.parse(await fs.readFile(new URL('../package.json', import.meta.url), 'utf8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
  } catch {
    // running from an unpacked tree without package.json
  }
  return undefined;
}

function logStartup(logger: Logger, cfg: SweepConfig) {
  logger.warning(
    'Starting sweep with the following parameters:\n' +
      `Bucket: ${cfg.bucket}\nPrefix: ${cfg.prefix}\n` +
      `Start Time: ${cfg.window.start.toISOString()}\nEnd Time: ${cfg.window.end.toISOString()}\n` +
      `Download Directory: ${cfg.downloadDir}\nResult File: ${cfg.resultsFile}\n` +
      `Profile Name: ${cfg.profile ?? '(default)'}\nLog Level: ${cfg.logLevel.toUpperCase()}\n` +
      `Concurrency: ${cfg.concurrency}\nScan Workers: ${cfg.scanWorkers}`,
  );
}

/**
 * Runs one sweep from a resolved config. Configuration and listing errors
 * reject; everything below the per-object boundary is folded into the
 * summary and the exit code.
 */
export async function executeSweep(cfg: SweepConfig, logger: Logger, deps: CliDeps = {}, version?: string): Promise<SweepRun> {
  await checkDownloadDir(cfg.downloadDir);
  const sink = new ResultSink(cfg.resultsFile, cfg.resultsFormat);
  try {
    await sink.open();
  } catch (err) {
    throw new ConfigError(`Results file ${cfg.resultsFile} is not writable: ${getErrorMessage(err)}`, { cause: err });
  }

  const runner = deps.detector ?? createDetectorRunner({
    command: cfg.detector.command,
    args: cfg.detector.args,
    timeoutMs: cfg.scanTimeoutMs,
  });
  const pool = new ScanPool(runner, cfg.scanWorkers);
  let ownStore: S3ObjectStore | undefined;
  let store: ObjectStore;
  if (deps.store) {
    store = deps.store;
  } else {
    ownStore = new S3ObjectStore({ profile: cfg.profile, region: cfg.region });
    store = ownStore;
  }

  const metrics = newMetrics();
  metrics.runtime_info = {
    concurrency: cfg.concurrency,
    scanWorkers: pool.size,
    resultsFormat: cfg.resultsFormat,
    version,
  };

  logStartup(logger, cfg);
  let summary: SweepSummary;
  try {
    summary = await runSweep(
      { bucket: cfg.bucket, prefix: cfg.prefix, window: cfg.window, downloadDir: cfg.downloadDir, concurrency: cfg.concurrency },
      { store, pool, sink, logger, onResult: (r) => recordPipeline(metrics, r) },
    );
  } finally {
    ownStore?.destroy();
  }
  recordSummary(metrics, summary);
  if (cfg.metricsPath) {
    try {
      await writeProm(metrics, cfg.metricsPath);
    } catch (err) {
      logger.error(`Could not write metrics to ${cfg.metricsPath}`, describeError(err));
    }
  }

  const poolStats = pool.stats();
  logger.warning('Sweep finished', {
    ...summary,
    recorded: sink.count,
    detectorRuns: poolStats.completed,
    detectorPeak: poolStats.peak,
    resultsFile: cfg.resultsFile,
  });
  let exitCode = EXIT_OK;
  if (summary.failed > 0) exitCode = EXIT_PIPELINE_FAILURES;
  else if (cfg.failOnFindings && summary.findings > 0) exitCode = EXIT_FINDINGS;
  return { summary, exitCode };
}

export async function runCli(argsIn: string[], deps: CliDeps = {}): Promise<number> {
  const program = buildProgram();
  const version = await readVersion();
  if (version) program.version(version);
  program.showHelpAfterError();
  // Prevent process.exit during tests; intercept help/version exits.
  program.exitOverride();
  try {
    program.parse(argsIn, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.code === 'commander.helpDisplayed' || err.code === 'commander.version') return EXIT_OK;
      return EXIT_FATAL;
    }
    throw err;
  }

  // config problems are reported before a logger with the requested level exists
  const bootLogger = createLogger({ level: 'error', sink: deps.logSink });
  let cfg: SweepConfig;
  try {
    const cli = parseCliOptions(program.opts());
    const { config: fileConfig, source } = await loadFileConfig(cli.config, deps.cwd);
    const [bucket, prefix, start, end, downloadDir, resultsFile] = program.args;
    cfg = resolveSweepConfig({ bucket, prefix, start, end, downloadDir, resultsFile }, cli, fileConfig);
    cfg.configFile = source;
  } catch (err) {
    bootLogger.critical(getErrorMessage(err), describeError(err));
    return EXIT_FATAL;
  }

  const logger = createLogger({ json: cfg.logJson, level: cfg.logLevel, sink: deps.logSink });
  if (cfg.configFile) logger.info(`Loaded config from ${cfg.configFile}`);
  try {
    const run = await executeSweep(cfg, logger, deps, version);
    return run.exitCode;
  } catch (err) {
    logger.critical(isFatalError(err) ? getErrorMessage(err) : `Sweep aborted: ${getErrorMessage(err)}`, describeError(err));
    return EXIT_FATAL;
  }
}
