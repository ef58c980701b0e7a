/**
 * Logger interface for the persistence package
 *
 * The consuming application injects its logger with setLogger(); until then
 * every call is a no-op. Never pass plaintext token values as metadata.
 */

export interface PersistenceLogger {
  info(_message: string, _meta?: Record<string, unknown>): void;
  warn(_message: string, _meta?: Record<string, unknown>): void;
  error(_message: string, _meta?: Record<string, unknown>): void;
  debug(_message: string, _meta?: Record<string, unknown>): void;
}

class NoOpLogger implements PersistenceLogger {
  info(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  warn(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  error(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }

  debug(_message: string, _meta?: Record<string, unknown>): void {
    // No-op
  }
}

let loggerInstance: PersistenceLogger = new NoOpLogger();

export function setLogger(logger: PersistenceLogger): void {
  loggerInstance = logger;
}

export function getLogger(): PersistenceLogger {
  return loggerInstance;
}

/**
 * Delegates to whichever logger is current at call time
 */
export const logger: PersistenceLogger = {
  info: (message, meta) => loggerInstance.info(message, meta),
  warn: (message, meta) => loggerInstance.warn(message, meta),
  error: (message, meta) => loggerInstance.error(message, meta),
  debug: (message, meta) => loggerInstance.debug(message, meta),
};
