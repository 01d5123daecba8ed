/**
 * Structured logging for Retention PDP.
 *
 * One JSON object per line: timestamp, level, service, message, then any
 * bindings and context fields. Sinks are pluggable so tests can capture
 * entries instead of writing to the console.
 */

import { describeError } from '../errors.js';

export const LogLevel = {
  DEBUG: 'debug',
  INFO: 'info',
  WARN: 'warn',
  ERROR: 'error',
} as const;

export type LogLevelValue = (typeof LogLevel)[keyof typeof LogLevel];

const LEVEL_RANK: Record<LogLevelValue, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogContext = Readonly<Record<string, unknown>>;

export interface LogRecord {
  readonly timestamp: string;
  readonly level: LogLevelValue;
  readonly service: string;
  readonly message: string;
  readonly [field: string]: unknown;
}

export type LogSink = (record: LogRecord) => void;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext, error?: unknown): void;
  /** Logger that adds the given fields to every record */
  child(bindings: LogContext): Logger;
}

export interface LoggerOptions {
  readonly service?: string;
  readonly level?: LogLevelValue;
  readonly sink?: LogSink;
  readonly bindings?: LogContext;
}

export function isLogLevel(value: string): value is LogLevelValue {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/**
 * Default sink: JSON line to the console stream matching the level
 */
export const consoleSink: LogSink = (record) => {
  const line = JSON.stringify(record);
  switch (record.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.log(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
};

class StructuredLogger implements Logger {
  private readonly service: string;
  private readonly threshold: number;
  private readonly sink: LogSink;
  private readonly bindings: LogContext;

  constructor(options: LoggerOptions) {
    this.service = options.service ?? 'retention-pdp';
    this.threshold = LEVEL_RANK[options.level ?? LogLevel.INFO];
    this.sink = options.sink ?? consoleSink;
    this.bindings = options.bindings ?? {};
  }

  debug(message: string, context: LogContext = {}): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, context: LogContext = {}, error?: unknown): void {
    const withError =
      error === undefined
        ? context
        : {
            ...context,
            error: {
              name: error instanceof Error ? error.name : 'Error',
              message: describeError(error),
              ...(isCoded(error) ? { code: error.code } : {}),
            },
          };
    this.write(LogLevel.ERROR, message, withError);
  }

  child(bindings: LogContext): Logger {
    return new StructuredLogger({
      service: this.service,
      level: levelForRank(this.threshold),
      sink: this.sink,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  private write(level: LogLevelValue, message: string, context: LogContext): void {
    if (LEVEL_RANK[level] < this.threshold) {
      return;
    }

    this.sink({
      ...this.bindings,
      ...context,
      timestamp: new Date().toISOString(),
      level,
      service: this.service,
      message,
    });
  }
}

function isCoded(error: unknown): error is { code: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}

function levelForRank(rank: number): LogLevelValue {
  const match = Object.values(LogLevel).find((level) => LEVEL_RANK[level] === rank);
  return match ?? LogLevel.INFO;
}

/**
 * Create a structured logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new StructuredLogger(options);
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
