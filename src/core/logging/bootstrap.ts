import pino from 'pino';
import type { Logger } from './types.js';

/**
 * Logger for code that runs before the container exists (config loading).
 * Reads its level straight from the environment; everything after start-up
 * uses the injected ILoggerFactory.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const level = process.env['B64URL_LOG_LEVEL']?.trim().toLowerCase() || 'silent';

    _bootstrapLogger = pino(
      {
        level: pino.levels.values[level] !== undefined || level === 'silent' ? level : 'silent',
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
