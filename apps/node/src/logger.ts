/**
 * Logging
 *
 * One pino root logger per process; components log through child loggers
 * tagged with `component`. Fastify builds its request logger from the same
 * options.
 */

import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';

export type { Logger };

export function loggerOptions(name: string, options: LoggerOptions = {}): LoggerOptions {
  return {
    name,
    level: process.env.LOG_LEVEL ?? 'info',
    transport: process.env.NODE_ENV === 'development' ? { target: 'pino-pretty' } : undefined,
    ...options,
  };
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  return pino(loggerOptions(name, options));
}

/**
 * Logger that discards everything (tests, embedded use)
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
