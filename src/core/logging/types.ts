import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - matches pino's Logger exactly.
 *
 * No abstraction, use library types directly.
 *
 * API follows pino idiom (data-first):
 *   logger.debug({ successes: 3 }, 'Exit condition met');
 *   logger.error({ err: error }, 'Operation failed');
 */
export type Logger = PinoLogger;

/**
 * Logger factory interface for DI.
 */
export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  /** Root logger instance */
  readonly root: Logger;
}

/**
 * Log level type.
 */
export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
