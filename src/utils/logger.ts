import * as logger from 'firebase-functions/logger';

/**
 * The subset of the structured logger the engine writes to. Anything with
 * these four methods can be injected, e.g. a host's own logger or a test spy.
 */
export interface SplitLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

type LogFn = (...args: unknown[]) => void;

// A trailing plain object becomes the structured payload; undefined would be
// printed into the message instead.
function forward(write: LogFn): SplitLogger['info'] {
  return (message, data) => (data ? write(message, data) : write(message));
}

export const defaultLogger: SplitLogger = {
  debug: forward(logger.debug),
  info: forward(logger.info),
  warn: forward(logger.warn),
  error: forward(logger.error),
};
