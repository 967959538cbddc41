/**
 * specwise - Logger
 *
 * Minimal logging contract used across the library and the demo host.
 */

import { ArgumentException } from '../../domain/exceptions/exceptions';

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Log levels, lowest first. `silent` suppresses everything.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a log level name (case-insensitive).
 *
 * @throws ArgumentException for unknown names
 */
export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new ArgumentException(
      `Unknown log level '${value}'. Expected one of: ${LOG_LEVELS.join(', ')}.`,
      'logLevel',
    );
  }
  return normalized;
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = {
  debug: (message, ...args) => console.debug(`[DEBUG] ${message}`, ...args),
  info: (message, ...args) => console.info(`[INFO] ${message}`, ...args),
  warn: (message, ...args) => console.warn(`[WARN] ${message}`, ...args),
  error: (message, ...args) => console.error(`[ERROR] ${message}`, ...args),
};

/**
 * Logger that drops every message.
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export interface LoggerOptions {
  /** Minimum level that reaches the sink (default: `info`) */
  level?: LogLevel;

  /** Where messages go (default: `consoleLogger`) */
  sink?: ILogger;
}

/**
 * Create a logger that forwards messages at or above `level` to `sink`.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'warn' });
 * logger.info('dropped');
 * logger.warn('printed');
 * ```
 */
export function createLogger(options: LoggerOptions = {}): ILogger {
  const sink = options.sink ?? consoleLogger;
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const enabled = (level: Exclude<LogLevel, 'silent'>) => LOG_LEVELS.indexOf(level) >= threshold;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) sink.debug(message, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) sink.info(message, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) sink.warn(message, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) sink.error(message, ...args);
    },
  };
}
