/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries.
 * The cache always logs pino-style: a context object first, then a message.
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const transport = createCachingTransport({ logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Winston
 * ```typescript
 * import winston from 'winston';
 * const transport = createCachingTransport({ logger: winston.createLogger({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const transport = createCachingTransport({ logger: consoleLogger });
 * ```
 */
export interface Logger {
  debug(obj: object | string, message?: string): void;
  info(obj: object | string, message?: string): void;
  warn(obj: object | string, message?: string): void;
  error(obj: object | string, message?: string): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (obj, message) => {
    if (message === undefined) console.debug(obj);
    else console.debug(message, obj);
  },
  info: (obj, message) => {
    if (message === undefined) console.info(obj);
    else console.info(message, obj);
  },
  warn: (obj, message) => {
    if (message === undefined) console.warn(obj);
    else console.warn(message, obj);
  },
  error: (obj, message) => {
    if (message === undefined) console.error(obj);
    else console.error(message, obj);
  },
};

/**
 * Silent logger - no output
 * Useful for testing or when you want to completely disable logging
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const minLevelNum = levels[minLevel];

  return {
    debug: (obj, message) => {
      if (levels.debug >= minLevelNum) baseLogger.debug(obj, message);
    },
    info: (obj, message) => {
      if (levels.info >= minLevelNum) baseLogger.info(obj, message);
    },
    warn: (obj, message) => {
      if (levels.warn >= minLevelNum) baseLogger.warn(obj, message);
    },
    error: (obj, message) => {
      if (levels.error >= minLevelNum) baseLogger.error(obj, message);
    },
  };
}
