import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type is pino's own. Call sites use pino's data-first idiom:
 *   logger.info({ jobId }, 'Scoring complete');
 *   logger.error({ err }, 'SendTaskFailure failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger bound to `component` */
  create(component: string): Logger;

  readonly root: Logger;
}

/** Logs go to stderr; stdout is reserved for the CLI's JSON output. */
export const LOG_FD = 2;

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function parseLogLevel(raw: string | undefined, fallback: LogLevel): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}
