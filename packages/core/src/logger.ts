/**
 * Logger utility using pino
 *
 * Logs are diagnostics for the people maintaining a run; they always go to
 * stderr so that reporter output on stdout stays clean.
 */

import type { Logger } from 'pino';
import pino from 'pino';
import { BENCHRUN_NAME } from './constants.js';

export type { Logger } from 'pino';

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = [
  'silent',
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace'
];

export type LoggerOptions = {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  component?: string;
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a logger instance writing to stderr
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const baseOptions: pino.LoggerOptions = {
    level: options.level ?? (envLevel && isLogLevel(envLevel) ? envLevel : 'info'),
    base: { component: options.component ?? BENCHRUN_NAME },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };

  if (options.format === 'pretty') {
    return pino({
      ...baseOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
          messageFormat: '{component} | {msg}'
        }
      }
    });
  }

  return pino(baseOptions, pino.destination(2));
}

/**
 * Create a silent logger (no-op)
 */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Map CLI verbosity options to log levels
 */
export function getLogLevel(options: {
  verbose?: boolean;
  quiet?: boolean;
  logLevel?: string;
}): LogLevel {
  if (options.logLevel && isLogLevel(options.logLevel)) {
    return options.logLevel;
  }
  if (options.verbose) {
    return 'debug';
  }
  if (options.quiet) {
    return 'error';
  }
  return 'warn';
}

/**
 * Log error with context
 */
export function logError(
  logger: Logger,
  error: unknown,
  message: string,
  context?: Record<string, unknown>
): void {
  const errorObj =
    error instanceof Error
      ? { message: error.message, stack: error.stack, name: error.name }
      : { value: String(error) };

  logger.error({ error: errorObj, ...context }, message);
}

/**
 * Measure and log operation duration
 */
export async function withDuration<T>(
  logger: Logger,
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  const start = Date.now();

  try {
    logger.debug(`Starting ${operation}`);
    const result = await fn();
    const duration_ms = Date.now() - start;
    logger.info({ duration_ms, operation }, `Completed ${operation} in ${duration_ms}ms`);
    return result;
  } catch (error) {
    const duration_ms = Date.now() - start;
    logError(logger, error, `Failed ${operation} after ${duration_ms}ms`, {
      duration_ms,
      operation
    });
    throw error;
  }
}
