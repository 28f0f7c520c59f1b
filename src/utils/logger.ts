/**
 * Structured logger
 *
 * pino logger writing JSON lines to stderr, so stdout stays reserved for
 * sample rows. Level can be forced with the NODESTAT_LOG_LEVEL environment
 * variable.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type LogLevel = LevelWithSilent;

export const LOG_LEVELS: readonly string[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

/**
 * Resolve the effective level: environment first, then the configured one.
 */
export function resolveLogLevel(configured: LogLevel = 'info'): LogLevel {
  const envLevel = process.env.NODESTAT_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return configured;
}

/**
 * Create the root logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * logger.info({ keyspace: 'app' }, 'Sampling started');
 * const child = logger.child({ component: 'NodetoolSource' });
 * ```
 */
export function createLogger(options: { level?: LogLevel; name?: string } = {}): Logger {
  return pino(
    {
      name: options.name ?? 'nodestat',
      level: resolveLogLevel(options.level),
    },
    pino.destination(2)
  );
}

export type { Logger };
