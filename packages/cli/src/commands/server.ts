/**
 * @fileoverview Server lifecycle commands for the optcp CLI.
 *
 * - info: Show where the server is and how it was built
 * - start: Launch a local server and wait until it answers
 * - ping: Check that a server answers
 * - kill: Ask a server to shut down
 *
 * @module commands/server
 */

import { Command } from 'commander';
import { ProcessSupervisor } from '@optcp/core';
import { createFormatter, type OutputFormat } from '../output/index.js';
import { addTargetOptions, createClient, resolveSettings, type TargetOptions } from './options.js';

/**
 * Print `error` with the requested formatter and exit with status 1.
 */
export function reportError(error: unknown, format: OutputFormat = 'text'): void {
  const formatter = createFormatter(format);
  if (error instanceof Error) {
    console.error(formatter.formatError(error));
  } else {
    console.error(`Unexpected error: ${String(error)}`);
  }
  process.exit(1);
}

async function handleInfo(options: TargetOptions): Promise<void> {
  let format = options.format;
  try {
    const config = await resolveSettings(options);
    format = config.output.format;
    const client = createClient(config);
    const formatter = createFormatter(format);
    console.log(formatter.formatDetails(client.details));
  } catch (error) {
    reportError(error, format);
  }
}

async function handleStart(options: TargetOptions): Promise<void> {
  let format = options.format;
  try {
    const config = await resolveSettings(options);
    format = config.output.format;
    // Detached so the server outlives this command
    const client = createClient(config, new ProcessSupervisor({ detached: true }));
    const formatter = createFormatter(format);

    if (formatter.formatProgress) {
      console.error(formatter.formatProgress(`Starting server at ${client.details.host}:${client.details.port}`));
    }
    await client.start();
    console.log(`Server running at ${client.details.host}:${client.details.port}`);
  } catch (error) {
    reportError(error, format);
  }
}

async function handlePing(options: TargetOptions): Promise<void> {
  let format = options.format;
  try {
    const config = await resolveSettings(options);
    format = config.output.format;
    const client = createClient(config);
    const ack = await client.ping();
    console.log(createFormatter(format).formatAck(ack));
  } catch (error) {
    reportError(error, format);
  }
}

async function handleKill(options: TargetOptions): Promise<void> {
  let format = options.format;
  try {
    const config = await resolveSettings(options);
    format = config.output.format;
    const client = createClient(config);
    await client.kill();
    console.log('Kill request sent');
  } catch (error) {
    reportError(error, format);
  }
}

/**
 * Create the `info` command.
 */
export function createInfoCommand(): Command {
  return addTargetOptions(
    new Command('info').description(
      'Show connection details\n\n' +
        'Reads optimizer.yml from the optimizer directory, or shows the given host and port.\n\n' +
        'Examples:\n' +
        '  $ optcp info --path python_build/rosenbrock\n' +
        '  $ optcp info --path python_build/rosenbrock --format json'
    )
  ).action(handleInfo);
}

/**
 * Create the `start` command.
 *
 * @example
 * ```typescript
 * const program = new Command();
 * program.addCommand(createStartCommand());
 * program.parse(['start', '--path', 'python_build/rosenbrock']);
 * ```
 */
export function createStartCommand(): Command {
  return addTargetOptions(
    new Command('start').description(
      'Start a local optimizer server\n\n' +
        'Runs the generated TCP server in the background and waits until it answers a ping.\n' +
        'Fails if something already listens on the configured port.\n\n' +
        'Examples:\n' +
        '  $ optcp start --path python_build/rosenbrock\n' +
        '  $ optcp start --path python_build/rosenbrock --attempts 60'
    )
  ).action(handleStart);
}

/**
 * Create the `ping` command.
 */
export function createPingCommand(): Command {
  return addTargetOptions(
    new Command('ping').description(
      'Ping an optimizer server\n\n' +
        'Examples:\n' +
        '  $ optcp ping --path python_build/rosenbrock\n' +
        '  $ optcp ping --host 10.0.0.5 --port 3301'
    )
  ).action(handlePing);
}

/**
 * Create the `kill` command.
 */
export function createKillCommand(): Command {
  return addTargetOptions(
    new Command('kill').description(
      'Stop an optimizer server\n\n' +
        'Sends a Kill request; does not wait for the process to exit.\n\n' +
        'Examples:\n' +
        '  $ optcp kill --path python_build/rosenbrock'
    )
  ).action(handleKill);
}
