/**
 * @fileoverview CLI router for optcp.
 *
 * Creates the main Commander program with all subcommands registered.
 *
 * @module commands/cli
 */

import { Command } from 'commander';
import { createCallCommand } from './call.js';
import { createConfigCommand } from './config.js';
import {
  createInfoCommand,
  createKillCommand,
  createPingCommand,
  createStartCommand,
} from './server.js';

/**
 * Create the main CLI program with all subcommands.
 *
 * @returns Configured Commander program
 *
 * @example
 * ```typescript
 * import { createCLI } from './commands/cli.js';
 *
 * const cli = createCLI();
 * cli.parse(process.argv);
 * ```
 */
export function createCLI(): Command {
  const program = new Command()
    .name('optcp')
    .description('optcp - manage and call optimizer TCP servers')
    .version('0.1.0');

  // Add subcommands
  program.addCommand(createInfoCommand());
  program.addCommand(createStartCommand());
  program.addCommand(createPingCommand());
  program.addCommand(createCallCommand());
  program.addCommand(createKillCommand());
  program.addCommand(createConfigCommand());

  return program;
}
