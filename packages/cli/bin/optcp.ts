#!/usr/bin/env node
/**
 * @fileoverview Executable entry point for `optcp`.
 *
 * Delegates to main() in src/index.ts. DEBUG=1 enables debug logging and
 * stack traces.
 *
 * @example
 * ```bash
 * optcp start --path python_build/rosenbrock
 * optcp call 1.0,2.0 --path python_build/rosenbrock
 * DEBUG=1 optcp ping --host 127.0.0.1 --port 8080
 * ```
 */

import { main, logger, setLogLevel } from '../src/index.js';

(() => {
  const debugMode = process.env.DEBUG === '1' || process.env.DEBUG === 'true';
  if (debugMode) {
    setLogLevel('debug');
  }

  logger.debug('CLI startup', {
    args: process.argv.slice(2),
    nodeVersion: process.version,
    debugMode,
  });

  main(process.argv.slice(2)).catch((error: unknown) => {
    if (error instanceof Error) {
      logger.error(`Error: ${error.message}`);
      if (debugMode) {
        logger.debug('Stack trace:', error.stack);
      }
    } else {
      logger.error(`An unexpected error occurred: ${String(error)}`);
    }
    process.exit(1);
  });
})();
