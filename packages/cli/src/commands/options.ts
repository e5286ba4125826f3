/**
 * @fileoverview Options shared by the commands that talk to a server.
 *
 * Every server command accepts the same target and connection flags, merges
 * them over the discovered settings file and builds an OptimizerClient.
 *
 * @module commands/options
 */

import { InvalidArgumentError, type Command } from 'commander';
import {
  OptimizerClient,
  ProcessSupervisor,
  setLogLevel,
  UsageError,
  type OptimizerTarget,
} from '@optcp/core';
import {
  loadConfig,
  mergeConfig,
  OutputFormatSchema,
  type Config,
  type ConfigOverrides,
} from '../config/index.js';
import type { OutputFormat } from '../output/index.js';

/**
 * Flags common to all server commands.
 */
export interface TargetOptions {
  config?: string;
  path?: string;
  host?: string;
  port?: number;
  format?: OutputFormat;
  attempts?: number;
  delay?: number;
  verbose?: boolean;
}

/**
 * Parse a base-10 integer flag, rejecting trailing garbage.
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Not an integer: ${value}`);
  }
  return parsed;
}

/**
 * Parse a comma-separated list of numbers, e.g. `1.0,2.5,-3`.
 */
export function parseVector(value: string): number[] {
  return value.split(',').map((item) => {
    const trimmed = item.trim();
    const parsed = Number(trimmed);
    if (trimmed === '' || !Number.isFinite(parsed)) {
      throw new InvalidArgumentError(`Not a number: '${trimmed}'`);
    }
    return parsed;
  });
}

/**
 * Parse the `--format` flag.
 */
export function parseFormat(value: string): OutputFormat {
  const parsed = OutputFormatSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected text, json, or yaml: ${value}`);
  }
  return parsed.data;
}

/**
 * Register the target and connection flags on `command`.
 */
export function addTargetOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'Path to a settings file (.optcprc.yaml)')
    .option('-p, --path <dir>', 'Directory of a generated optimizer (contains optimizer.yml)')
    .option('-H, --host <host>', 'Host of a running optimizer server')
    .option('-P, --port <port>', 'Port of a running optimizer server', parseInteger)
    .option('-f, --format <format>', 'Output format: text, json, or yaml', parseFormat)
    .option('--attempts <n>', 'Connection attempts before giving up (default: 10)', parseInteger)
    .option('--delay <ms>', 'Delay between connection attempts (default: 1000)', parseInteger)
    .option('-v, --verbose', 'Log debug output', false);
}

/**
 * Load the settings file and apply the command-line flags over it.
 */
export async function resolveSettings(options: TargetOptions): Promise<Config> {
  if (options.verbose) {
    setLogLevel('debug');
  }

  const fileConfig = await loadConfig(options.config);
  const cliFlags: ConfigOverrides = {
    path: options.path,
    host: options.host,
    port: options.port,
    retry: {
      attempts: options.attempts,
      delayMs: options.delay,
    },
    output: options.format ? { format: options.format } : undefined,
  };

  return mergeConfig(fileConfig, cliFlags);
}

/**
 * The server target named by the settings.
 *
 * @throws {UsageError} If neither a path nor a host and port are set
 */
export function targetOf(config: Config): OptimizerTarget {
  if (config.path !== undefined) {
    return { path: config.path };
  }
  if (config.host !== undefined && config.port !== undefined) {
    return { host: config.host, port: config.port };
  }
  throw new UsageError('No optimizer given: use --path, or --host and --port');
}

/**
 * Build a client from resolved settings.
 */
export function createClient(config: Config, supervisor?: ProcessSupervisor): OptimizerClient {
  return new OptimizerClient(targetOf(config), {
    retry: config.retry,
    settleDelayMs: config.settleDelayMs,
    currentVersion: config.currentVersion,
    supervisor,
  });
}
