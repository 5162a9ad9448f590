export type LogLevel = 'critical' | 'error' | 'warning' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['critical', 'error', 'warning', 'info', 'debug'];

export type LogMeta = Record<string, unknown>;

type LogSink = (line: string) => void;

export type LoggerOptions = {
  json?: boolean;
  level?: LogLevel;
  name?: string;
  sink?: LogSink;
};

export class Logger {
  private json: boolean;
  private levelPriority: Record<LogLevel, number> = { critical: 0, error: 1, warning: 2, info: 3, debug: 4 };
  private currentLevel: LogLevel;
  private name: string;
  private sink: LogSink;

  constructor(opts?: LoggerOptions) {
    this.json = !!opts?.json;
    this.currentLevel = opts?.level || 'warning';
    this.name = opts?.name || 'logsweep';
    // stdout stays free for tooling; logs go to stderr
    this.sink = opts?.sink || ((line) => console.error(line));
  }

  get level(): LogLevel {
    return this.currentLevel;
  }

  isEnabled(l: LogLevel) {
    return this.levelPriority[l] <= this.levelPriority[this.currentLevel];
  }

  log(l: LogLevel, message: string, meta?: LogMeta) {
    if (!this.isEnabled(l)) return;
    const ts = new Date().toISOString();
    if (this.json) {
      this.sink(JSON.stringify({ ts, logger: this.name, level: l, message, ...meta }));
    } else {
      const metaStr = meta && Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      this.sink(`${ts} - ${this.name} - ${l.toUpperCase()} - ${message}${metaStr}`);
    }
  }

  critical(msg: string, meta?: LogMeta) { this.log('critical', msg, meta); }
  error(msg: string, meta?: LogMeta) { this.log('error', msg, meta); }
  warning(msg: string, meta?: LogMeta) { this.log('warning', msg, meta); }
  info(msg: string, meta?: LogMeta) { this.log('info', msg, meta); }
  debug(msg: string, meta?: LogMeta) { this.log('debug', msg, meta); }
}

export function createLogger(opts?: LoggerOptions) {
  return new Logger(opts);
}

/** Accepts `DEBUG`, `warning`, `Warn`... and returns the canonical level, or undefined. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const v = value.trim().toLowerCase();
  if (v === 'warn') return 'warning';
  if (v === 'fatal') return 'critical';
  return LOG_LEVELS.find((l) => l === v);
}
