// Types
export type { Logger, ILoggerFactory, LogLevel } from './types.js';

// Factory (for container registration)
export { PinoLoggerFactory } from './create-logger.js';

// Bootstrap (for pre-container code)
export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';
