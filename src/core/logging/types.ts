import type { Logger as PinoLogger } from 'pino';

/**
 * Logger type - pino's Logger, unwrapped.
 *
 * Data-first calls:
 *   logger.debug({ inputBytes: 5 }, 'Input read');
 *   logger.error({ err: error }, 'Transform failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Create a child logger for a component */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
