/**
 * specwise - Host Options
 *
 * Configuration for the demo host and the warehouse rules, resolved from
 * explicit overrides first, then environment variables, then defaults.
 */

import { Guard } from '../../domain/exceptions/guards';
import { Clock, systemClock } from '../../domain/time/clock';
import { createLogger, ILogger, LogLevel, parseLogLevel } from './logger';

/**
 * Host configuration options
 */
export interface SpecwiseOptions {
  /** Application name */
  name?: string;

  /** Environment (development, production, test) */
  environment?: string;

  /** Minimum log level */
  logLevel?: LogLevel;

  /** Country treated as domestic by international-shipping rules */
  domesticCountry?: string;

  /** Time source for date-based rules */
  clock?: Clock;

  /** Custom logger (replaces the one built from `logLevel`) */
  logger?: ILogger;
}

/**
 * Options with every field filled in.
 */
export type ResolvedSpecwiseOptions = Required<SpecwiseOptions>;

/**
 * Environment variables read by `resolveOptions`.
 */
export const ENV_KEYS = {
  environment: 'NODE_ENV',
  logLevel: 'SPECWISE_LOG_LEVEL',
  domesticCountry: 'SPECWISE_DOMESTIC_COUNTRY',
} as const;

export const DEFAULT_OPTIONS = {
  name: 'specwise-demo',
  environment: 'development',
  logLevel: 'info',
  domesticCountry: 'USA',
} as const;

/**
 * Resolve host options.
 *
 * @param overrides - Explicit options; win over the environment
 * @param env - Environment to read (default: `process.env`)
 * @throws ArgumentException when the log level is unknown or the domestic
 * country is blank
 *
 * @example
 * ```typescript
 * const options = resolveOptions({ name: 'rules-demo' });
 * options.logger.info(`Starting ${options.name} (${options.environment})`);
 * ```
 */
export function resolveOptions(
  overrides: SpecwiseOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedSpecwiseOptions {
  const envLogLevel = env[ENV_KEYS.logLevel];
  const logLevel =
    overrides.logLevel ??
    (envLogLevel !== undefined && envLogLevel !== '' ? parseLogLevel(envLogLevel) : undefined) ??
    (env[ENV_KEYS.environment] === 'test' ? 'silent' : DEFAULT_OPTIONS.logLevel);

  const domesticCountry = Guard.againstBlank(
    overrides.domesticCountry ?? env[ENV_KEYS.domesticCountry] ?? DEFAULT_OPTIONS.domesticCountry,
    'domesticCountry',
  );

  return {
    name: overrides.name ?? DEFAULT_OPTIONS.name,
    environment: overrides.environment ?? env[ENV_KEYS.environment] ?? DEFAULT_OPTIONS.environment,
    logLevel,
    domesticCountry,
    clock: overrides.clock ?? systemClock,
    logger: overrides.logger ?? createLogger({ level: logLevel }),
  };
}
