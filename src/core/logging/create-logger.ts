import pino from 'pino';
import type { DestinationStream } from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';

/**
 * Root pino logger.
 *
 * - Sync JSON output to stderr (fd 2); stdout carries the transformed bytes
 * - ISO timestamps
 * - Error stack traces through the `err` serializer
 */
function createRootLogger(level: LogLevel, destination: DestinationStream): Logger {
  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination
  );
}

/**
 * Logger factory - creates component loggers from one root.
 * Registered as a singleton in the container.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel, destination: DestinationStream = pino.destination({ dest: 2, sync: true })) {
    this._root = createRootLogger(level, destination);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
