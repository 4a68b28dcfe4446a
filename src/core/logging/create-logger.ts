import pino, { type DestinationStream } from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';

/**
 * Create the root pino logger instance.
 *
 * - Sync output to stderr (stdout carries the report line)
 * - JSON format for machine parsing
 */
export function createRootLogger(level: LogLevel, destination?: DestinationStream): Logger {
  return pino(
    {
      level,

      // ISO timestamps for consistency
      timestamp: pino.stdTimeFunctions.isoTime,

      // Include error stack traces
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination ?? pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 * Registered once in the container.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel, destination?: DestinationStream) {
    this._root = createRootLogger(level, destination);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
