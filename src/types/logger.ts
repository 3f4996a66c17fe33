/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface that works with popular logging libraries
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const session = await openSession({ logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const session = await openSession({ logger: console });
 * ```
 *
 * @example Custom logger
 * ```typescript
 * const logger = {
 *   debug: (msg) => myCustomLog('DEBUG', msg),
 *   info: (msg) => myCustomLog('INFO', msg),
 *   warn: (msg) => myCustomLog('WARN', msg),
 *   error: (msg) => myCustomLog('ERROR', msg),
 * };
 * const session = await openSession({ logger });
 * ```
 */
export interface Logger {
  /**
   * Debug level logging
   * Called for every command sent and reply received by the engines
   */
  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  /**
   * Warn level logging
   * Called when an operation finishes with an error message
   */
  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Console adapter - wraps console to match Logger interface
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => {
    console.debug(msgOrObj, ...args);
  },
  info: (msgOrObj: string | object, ...args: unknown[]) => {
    console.info(msgOrObj, ...args);
  },
  warn: (msgOrObj: string | object, ...args: unknown[]) => {
    console.warn(msgOrObj, ...args);
  },
  error: (msgOrObj: string | object, ...args: unknown[]) => {
    console.error(msgOrObj, ...args);
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

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LogLevel): Logger {
  const levels: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };
  const minLevelNum = levels[minLevel];

  return {
    debug: (msgOrObj: string | object, ...args: unknown[]) => {
      if (levels.debug >= minLevelNum) forward(baseLogger, 'debug', msgOrObj, args);
    },
    info: (msgOrObj: string | object, ...args: unknown[]) => {
      if (levels.info >= minLevelNum) forward(baseLogger, 'info', msgOrObj, args);
    },
    warn: (msgOrObj: string | object, ...args: unknown[]) => {
      if (levels.warn >= minLevelNum) forward(baseLogger, 'warn', msgOrObj, args);
    },
    error: (msgOrObj: string | object, ...args: unknown[]) => {
      if (levels.error >= minLevelNum) forward(baseLogger, 'error', msgOrObj, args);
    },
  };
}

function forward(logger: Logger, level: LogLevel, msgOrObj: string | object, args: unknown[]): void {
  if (typeof msgOrObj === 'string') {
    logger[level](msgOrObj, ...args);
    return;
  }
  const [message, ...rest] = args;
  logger[level](msgOrObj, typeof message === 'string' ? message : undefined, ...rest);
}
