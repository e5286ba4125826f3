/**
 * @fileoverview Public API for the @optcp/cli package.
 *
 * Exports the CLI entry point together with the settings and output
 * helpers the commands are built from.
 *
 * @module @optcp/cli
 *
 * @example
 * ```typescript
 * import { createCLI, setLogLevel } from '@optcp/cli';
 *
 * setLogLevel('debug');
 *
 * const cli = createCLI();
 * cli.parse(process.argv);
 * ```
 */

import { logger, setLogLevel, getLogLevel, type LogLevel } from '@optcp/core';

// Re-export logger utilities
export { logger, setLogLevel, getLogLevel, type LogLevel };

// Re-export command utilities
export {
  createCLI,
  createCallCommand,
  createConfigCommand,
  createInfoCommand,
  createStartCommand,
  createPingCommand,
  createKillCommand,
} from './commands/index.js';

// Re-export config utilities
export {
  ConfigSchema,
  parseConfig,
  loadConfig,
  mergeConfig,
  getConfigPath,
  type Config,
  type ConfigOverrides,
  type OutputFormat,
  type RetryConfig,
  type OutputConfig,
} from './config/index.js';

// Re-export formatters
export {
  createFormatter,
  TextFormatter,
  JsonFormatter,
  YamlFormatter,
  type Formatter,
} from './output/index.js';

/**
 * Main CLI entry point.
 *
 * @param args - Command-line arguments (typically process.argv.slice(2))
 *
 * @example
 * ```typescript
 * // In bin/optcp.ts
 * import { main } from '../src/index.js';
 * main(process.argv.slice(2)).catch(console.error);
 * ```
 */
export async function main(args: string[]): Promise<void> {
  const { createCLI } = await import('./commands/index.js');
  logger.debug('CLI main() called', { args });

  const cli = createCLI();
  await cli.parseAsync(['node', 'optcp', ...args]);
}
