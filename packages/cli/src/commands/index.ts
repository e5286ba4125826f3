/**
 * @fileoverview Command exports for the optcp CLI.
 *
 * @module commands
 */

export { createCLI } from './cli.js';
export { createCallCommand } from './call.js';
export { createConfigCommand } from './config.js';
export {
  createInfoCommand,
  createStartCommand,
  createPingCommand,
  createKillCommand,
} from './server.js';
