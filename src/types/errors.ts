/**
 * Type-safe error handling utilities and the sweep's error taxonomy
 */

/**
 * Type guard to check if a value is an Error
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}

/**
 * Safely get error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (isError(error)) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return String(error);
}

/**
 * Node.js system error with code
 */
export interface NodeError extends Error {
  code?: string;
  errno?: number;
  syscall?: string;
  path?: string;
}

/**
 * Type guard for Node.js system errors
 */
export function isNodeError(error: unknown): error is NodeError {
  return isError(error) && 'code' in error;
}

/**
 * Where in a run an error was raised. `config` and `list` abort the whole
 * run; the rest stay inside a single object's pipeline.
 */
export type SweepStage = 'config' | 'list' | 'fetch' | 'expand' | 'scan';

export class SweepError extends Error {
  readonly stage: SweepStage;

  constructor(stage: SweepStage, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SweepError';
    this.stage = stage;
  }
}

export class ConfigError extends SweepError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config', message, options);
    this.name = 'ConfigError';
  }
}

export class ListingError extends SweepError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('list', message, options);
    this.name = 'ListingError';
  }
}

export class FetchError extends SweepError {
  readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super('fetch', message, options);
    this.name = 'FetchError';
    this.key = key;
  }
}

export class ExpansionError extends SweepError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('expand', message, options);
    this.name = 'ExpansionError';
    this.filePath = filePath;
  }
}

/** The detector ran but its report was not the expected shape. */
export class ScanProtocolError extends SweepError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('scan', message, options);
    this.name = 'ScanProtocolError';
    this.filePath = filePath;
  }
}

/** The detector could not be run, exited non-zero or was killed by the watchdog. */
export class ScanExecutionError extends SweepError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('scan', message, options);
    this.name = 'ScanExecutionError';
    this.filePath = filePath;
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof SweepError && (error.stage === 'config' || error.stage === 'list');
}
