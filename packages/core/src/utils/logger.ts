/**
 * @fileoverview Logging utility for the optcp packages.
 *
 * A levelled console logger (debug, info, warn, error, silent) shared by the
 * core library and the CLI. The level is process-wide: the CLI raises it with
 * `--verbose` or `DEBUG=1`, and the client logs launch, retry and kill steps
 * through it.
 *
 * @module @optcp/core/utils/logger
 *
 * @example
 * ```typescript
 * import { logger, setLogLevel } from '@optcp/core';
 *
 * setLogLevel('debug');
 * logger.debug('Connecting', { host: '127.0.0.1', port: 8080 });
 * logger.info('TCP/IP details: 127.0.0.1:8080');
 * logger.warn('Version mismatch');
 * logger.error('Port 8080 not available');
 * ```
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const PREFIX = '[optcp]';

let currentLevel: LogLevel = 'info';

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/**
 * Set the global log level.
 *
 * @param level - The log level to set
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Get the current log level.
 *
 * @returns The current log level
 */
export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Check if a message at the given level should be logged.
 *
 * @param level - The log level to check
 * @returns true if the message should be logged
 */
function shouldLog(level: LogLevel): boolean {
  return levels[level] >= levels[currentLevel];
}

/**
 * Logger object with one method per level.
 */
export const logger = {
  /**
   * Log a debug-level message, such as a failed connection attempt.
   *
   * @param message - The message to log
   * @param args - Additional arguments to pass to console.debug
   */
  debug: (message: string, ...args: unknown[]) => {
    if (shouldLog('debug')) {
      console.debug(`${PREFIX} DEBUG: ${message}`, ...args);
    }
  },

  /**
   * Log an info-level message. Written to stdout.
   *
   * @param message - The message to log
   * @param args - Additional arguments to pass to console.log
   */
  info: (message: string, ...args: unknown[]) => {
    if (shouldLog('info')) {
      console.log(`${PREFIX} ${message}`, ...args);
    }
  },

  /**
   * Log a warning-level message, such as a version advisory.
   *
   * @param message - The message to log
   * @param args - Additional arguments to pass to console.warn
   */
  warn: (message: string, ...args: unknown[]) => {
    if (shouldLog('warn')) {
      console.warn(`${PREFIX} WARN: ${message}`, ...args);
    }
  },

  /**
   * Log an error-level message.
   *
   * @param message - The message to log
   * @param args - Additional arguments to pass to console.error
   */
  error: (message: string, ...args: unknown[]) => {
    if (shouldLog('error')) {
      console.error(`${PREFIX} ERROR: ${message}`, ...args);
    }
  },
};
