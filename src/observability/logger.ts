export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  ts: string; // ISO timestamp
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean; // If false, use human-readable format
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some(level => level === value);
}

export function toErrorContext(error: unknown): LogContext {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name, stack: error.stack };
  }
  return { error: String(error) };
}

export interface LogWriter {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
}

export class Logger implements LogWriter {
  private readonly level: LogLevel;
  private readonly json: boolean;

  constructor(options: LoggerOptions) {
    this.level = options.level;
    this.json = options.json;
  }

  private shouldLog(level: LogLevel): boolean {
    return level !== 'silent' && LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private format(level: LogLevel, msg: string, context?: LogContext): string {
    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...context,
    };

    if (this.json) {
      return JSON.stringify(entry);
    }

    const levelStr = level.toUpperCase().padEnd(5);
    const contextStr = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    return `[${entry.ts}] ${levelStr} ${msg}${contextStr}`;
  }

  private write(level: LogLevel, msg: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;
    process.stderr.write(this.format(level, msg, context) + '\n');
  }

  debug(msg: string, context?: LogContext): void {
    this.write('debug', msg, context);
  }

  info(msg: string, context?: LogContext): void {
    this.write('info', msg, context);
  }

  warn(msg: string, context?: LogContext): void {
    this.write('warn', msg, context);
  }

  error(msg: string, context?: LogContext): void {
    this.write('error', msg, context);
  }

  child(context: LogContext): LogWriter {
    return new ChildLogger(this, context);
  }

  time(label: string): () => number {
    const start = performance.now();
    return () => {
      const durationMs = Math.round(performance.now() - start);
      this.debug(`${label} completed`, { durationMs });
      return durationMs;
    };
  }
}

class ChildLogger implements LogWriter {
  constructor(
    private parent: Logger,
    private context: LogContext
  ) {}

  debug(msg: string, context?: LogContext): void {
    this.parent.debug(msg, { ...this.context, ...context });
  }

  info(msg: string, context?: LogContext): void {
    this.parent.info(msg, { ...this.context, ...context });
  }

  warn(msg: string, context?: LogContext): void {
    this.parent.warn(msg, { ...this.context, ...context });
  }

  error(msg: string, context?: LogContext): void {
    this.parent.error(msg, { ...this.context, ...context });
  }
}

let globalLogger: Logger | null = null;

export function createLogger(options: LoggerOptions): Logger {
  globalLogger = new Logger(options);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger({ level: 'info', json: false });
  }
  return globalLogger;
}
