import pino from 'pino';
import type { Logger } from 'pino';

let baseLogger: Logger | undefined;

/**
 * Returns the library's base pino logger, created on first use.
 *
 * The level comes from `LOG_LEVEL` (default `info`). Pass your own logger
 * through {@link LockOptions.logger} to route lock events elsewhere.
 */
export function createLogger(): Logger {
  baseLogger ??= pino({
    name: 'redis-signal-lock',
    level: process.env.LOG_LEVEL ?? 'info',
  });
  return baseLogger;
}

/**
 * Child logger bound to one lock name.
 */
export function lockLogger(name: string): Logger {
  return createLogger().child({ lock: name });
}
