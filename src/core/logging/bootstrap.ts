import pino from 'pino';
import type { Logger } from './types.js';

/**
 * Bootstrap logger for use BEFORE the DI container is initialized.
 *
 * Used by the composition root while configuration is still being loaded.
 * After DI is ready, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const level = process.env['PROBECOND_LOG_LEVEL']?.toLowerCase() || 'silent';

    _bootstrapLogger = pino(
      {
        level,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

/**
 * Create a bootstrap logger with component context.
 */
export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
