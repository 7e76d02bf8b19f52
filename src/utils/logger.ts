import { pino, type DestinationStream, type Logger } from 'pino';
import type { LoggingConfig } from '../config/config.js';

/**
 * Create the root logger. Components derive their own with
 * `logger.child({ module })`.
 */
export function createLogger(config: LoggingConfig, name = 'conductor', destination?: DestinationStream): Logger {
  return pino(
    {
      name,
      level: config.level,
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination
  );
}

/**
 * Normalize an unknown thrown value into a loggable message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
