import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { DetectorReport } from './types.js';
import { getErrorMessage, isNodeError, ScanExecutionError, ScanProtocolError } from './types/errors.js';

const execFileAsync = promisify(execFile);

/**
 * Runs the external secret detector against one file and resolves with its
 * raw stdout.
 */
export type DetectorRunner = (filePath: string) => Promise<string>;

export type DetectorOptions = {
  /** Executable, resolved through PATH (default: detect-secrets) */
  command?: string;
  /** Arguments placed before the file path (default: ['scan']) */
  args?: string[];
  /** Kill the detector after this many ms; 0 disables the watchdog */
  timeoutMs?: number;
  maxBufferBytes?: number;
};

export const DEFAULT_DETECTOR_COMMAND = 'detect-secrets';
export const DEFAULT_DETECTOR_ARGS: readonly string[] = ['scan'];

export function createDetectorRunner(opts: DetectorOptions = {}): DetectorRunner {
  const command = opts.command || DEFAULT_DETECTOR_COMMAND;
  const args = opts.args ?? [...DEFAULT_DETECTOR_ARGS];
  const timeout = Math.max(0, opts.timeoutMs ?? 0);
  const maxBuffer = opts.maxBufferBytes ?? 64 * 1024 * 1024;
  return async (filePath: string) => {
    try {
      const { stdout } = await execFileAsync(command, [...args, filePath], {
        encoding: 'utf8',
        timeout,
        maxBuffer,
        windowsHide: true,
      });
      return stdout;
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        throw new ScanExecutionError(filePath, `Detector '${command}' not found on PATH`, { cause: err });
      }
      if (err instanceof Error && 'killed' in err && err.killed === true) {
        throw new ScanExecutionError(filePath, `Detector timed out after ${timeout}ms on ${filePath}`, { cause: err });
      }
      throw new ScanExecutionError(filePath, `Detector failed on ${filePath}: ${getErrorMessage(err)}`, { cause: err });
    }
  };
}

const DetectorReportSchema = z
  .object({
    results: z.record(z.string(), z.array(z.record(z.string(), z.unknown()))),
  })
  .passthrough();

/**
 * Parses detector stdout. Anything other than an object carrying a
 * `results` mapping of filename to finding list is a protocol violation.
 */
export function parseDetectorReport(stdout: string, filePath: string): DetectorReport {
  let data: unknown;
  try {
    data = JSON.parse(stdout);
  } catch (err) {
    throw new ScanProtocolError(filePath, `Detector output for ${filePath} is not JSON: ${getErrorMessage(err)}`, { cause: err });
  }
  const parsed = DetectorReportSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join(', ');
    throw new ScanProtocolError(filePath, `Unexpected detector output for ${filePath}: ${issues}`);
  }
  return parsed.data;
}

export function countFindings(report: DetectorReport): number {
  return Object.values(report.results).reduce((n, entries) => n + entries.length, 0);
}
