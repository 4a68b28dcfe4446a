// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';

// Factory (for DI registration)
export { PinoLoggerFactory, createRootLogger } from './create-logger.js';

// Bootstrap (for pre-DI code)
export { createBootstrapLogger } from './bootstrap.js';
