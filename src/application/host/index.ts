/**
 * @module specwise/application/host
 * @description Logging and configuration for hosts built on specwise
 */

export {
  LOG_LEVELS,
  isLogLevel,
  parseLogLevel,
  consoleLogger,
  silentLogger,
  createLogger,
} from './logger';

export type { ILogger, LogLevel, LoggerOptions } from './logger';

export { ENV_KEYS, DEFAULT_OPTIONS, resolveOptions } from './options';

export type { SpecwiseOptions, ResolvedSpecwiseOptions } from './options';
