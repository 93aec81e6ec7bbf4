/**
 * Structured logging utility for relaunch
 *
 * Provides consistent logging with levels, structured metadata, and
 * environment-based configuration. Supervisor messages share the terminal
 * with the child's output, so every line carries a coloured `[relaunch]` tag.
 */

import { Chalk, type ChalkInstance } from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogValue = string | number | boolean | null | undefined | LogValue[] | { [key: string]: LogValue };

export interface LogMetadata {
  [key: string]: LogValue;
}

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  quiet?: boolean;
  stdout?: LogSink;
  stderr?: LogSink;
  /** Force colours on or off; defaults to chalk's terminal detection */
  colors?: boolean;
  now?: () => Date;
}

const TAG = '[relaunch]';

export function parseLogLevel(level: string | undefined, quiet: boolean): LogLevel {
  if (!level) return quiet ? LogLevel.WARN : LogLevel.INFO;

  switch (level.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
    default:
      return LogLevel.INFO;
  }
}

export class Logger {
  private level: LogLevel;
  private quiet: boolean;
  private readonly stdout: LogSink;
  private readonly stderr: LogSink;
  private readonly chalk: ChalkInstance;
  private readonly now: () => Date;

  constructor(options: LoggerOptions = {}) {
    this.quiet = options.quiet ?? process.env.RELAUNCH_QUIET === 'true';
    this.level = options.level ?? parseLogLevel(process.env.RELAUNCH_LOG_LEVEL, this.quiet);
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.chalk = options.colors === undefined ? new Chalk() : new Chalk({ level: options.colors ? 1 : 0 });
    this.now = options.now ?? (() => new Date());
  }

  private shouldLog(level: LogLevel): boolean {
    return level >= this.level;
  }

  private formatMessage(level: LogLevel, message: string, meta?: LogMetadata): string {
    const tag = this.colorTag(level);
    const prefix = level === LogLevel.DEBUG ? `${tag} ${this.chalk.gray(this.now().toISOString())}` : tag;

    if (meta && Object.keys(meta).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(meta)}`;
    }

    return `${prefix} ${message}`;
  }

  private colorTag(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return this.chalk.gray(TAG);
      case LogLevel.WARN:
        return this.chalk.yellow(TAG);
      case LogLevel.ERROR:
        return this.chalk.red(TAG);
      default:
        return this.chalk.green(TAG);
    }
  }

  debug(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return;
    this.stdout.write(`${this.formatMessage(LogLevel.DEBUG, message, meta)}\n`);
  }

  info(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.INFO)) return;
    this.stdout.write(`${this.formatMessage(LogLevel.INFO, message, meta)}\n`);
  }

  warn(message: string, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.WARN)) return;
    this.stderr.write(`${this.formatMessage(LogLevel.WARN, message, meta)}\n`);
  }

  error(message: string, error?: unknown, meta?: LogMetadata): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    let errorMeta: LogMetadata | undefined = meta;
    if (error instanceof Error) {
      errorMeta = {
        ...meta,
        errorName: error.name,
        ...(this.level === LogLevel.DEBUG ? { errorStack: error.stack } : {}),
      };
    } else if (error !== undefined) {
      errorMeta = { ...meta, error: String(error) };
    }

    this.stderr.write(`${this.formatMessage(LogLevel.ERROR, message, errorMeta)}\n`);
  }

  isQuiet(): boolean {
    return this.quiet;
  }

  /**
   * Set quiet mode (suppresses INFO and DEBUG)
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
    if (quiet && this.level < LogLevel.WARN) {
      this.level = LogLevel.WARN;
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }
}

export const logger = new Logger();

/**
 * Print to stdout without the supervisor tag
 * Use this for user-facing CLI output
 */
export function print(message: string): void {
  process.stdout.write(`${message}\n`);
}

export const log = {
  debug: (message: string, meta?: LogMetadata) => logger.debug(message, meta),
  info: (message: string, meta?: LogMetadata) => logger.info(message, meta),
  warn: (message: string, meta?: LogMetadata) => logger.warn(message, meta),
  error: (message: string, error?: unknown, meta?: LogMetadata) =>
    logger.error(message, error, meta),
  isQuiet: () => logger.isQuiet(),
  setQuiet: (quiet: boolean) => logger.setQuiet(quiet),
  setLevel: (level: LogLevel) => logger.setLevel(level),
};
