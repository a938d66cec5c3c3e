/**
 * Logger - pino factory and timing helper
 *
 * All structured logging goes through pino. CLI banners for humans are
 * printed separately with console.error.
 */

import pino, { type Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export interface LoggerOptions {
  /** Component name, emitted as `name` on every line */
  name?: string;
  /** Minimum level; defaults to LOG_LEVEL or `info` */
  level?: LogLevel | string;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

function resolveLevel(level: string | undefined): LogLevel {
  const candidate = (level ?? process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(candidate) ? candidate : 'info';
}

/**
 * Create a pino logger writing JSON lines to stderr, so stdout stays free
 * for command output.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? 'cluster-deploy-stages',
      level: resolveLevel(options.level),
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
}

export interface Timer {
  /** Log completion with the elapsed time */
  end(fields?: Record<string, unknown>): number;
  /** Log failure with the elapsed time */
  error(error: unknown, fields?: Record<string, unknown>): number;
}

/**
 * Start timing an operation.
 *
 * @example
 * ```typescript
 * const timer = createTimer(logger, 'rke2-deploy');
 * // ... run the stage ...
 * timer.end({ exitCode });
 * ```
 */
export function createTimer(logger: Logger, operation: string): Timer {
  const startedAt = Date.now();

  return {
    end(fields = {}) {
      const durationMs = Date.now() - startedAt;
      logger.debug({ operation, durationMs, ...fields }, `${operation} finished`);
      return durationMs;
    },
    error(error, fields = {}) {
      const durationMs = Date.now() - startedAt;
      logger.error({ operation, durationMs, error, ...fields }, `${operation} failed`);
      return durationMs;
    },
  };
}
