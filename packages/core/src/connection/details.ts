/**
 * @fileoverview Resolution of optimizer connection details.
 *
 * Details come either from the `optimizer.yml` descriptor of a locally
 * generated optimizer (parsed with `yaml`, validated with Zod) or from an
 * explicit host/port pair for a server running elsewhere.
 *
 * @module @optcp/core/connection/details
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { Advisory, ConnectionDetails, ServerBuildInfo } from '../types/index.js';

/**
 * File name of the descriptor inside an optimizer directory.
 */
export const DESCRIPTOR_FILENAME = 'optimizer.yml';

/**
 * The subset of the descriptor the client consumes. Unknown keys are ignored.
 */
export const DescriptorSchema = z.object({
  tcp: z.object({
    ip: z.string().min(1),
    port: z.number().int().min(1).max(65535),
  }),
  build: z.object({
    build_mode: z.enum(['debug', 'release']),
    opengen_version: z.union([z.string().min(1), z.number()]).transform(String),
  }),
  meta: z.object({
    optimizer_name: z.string().min(1),
  }),
});

export type Descriptor = z.infer<typeof DescriptorSchema>;

/**
 * Arguments accepted by {@link resolveConnectionDetails}. Exactly one of
 * `path` or `host`/`port` must be given.
 */
export interface ConnectionInput {
  /** Directory containing `optimizer.yml` */
  path?: string;
  host?: string;
  port?: number;
  /** Generator version of the caller, compared with the stamped version */
  currentVersion?: string;
}

/**
 * Resolved details plus any advisories found on the way.
 */
export interface ResolvedConnection {
  details: ConnectionDetails;
  advisories: Advisory[];
}

/**
 * Load and validate the descriptor inside `optimizerPath`.
 *
 * @throws {ConfigError} If the file is missing, is not valid YAML, or lacks
 *   a required field
 */
export function loadDescriptor(optimizerPath: string): Descriptor {
  const file = join(optimizerPath, DESCRIPTOR_FILENAME);
  logger.debug(`Loading TCP/IP details from ${file}`);

  let text: string;
  try {
    text = readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read descriptor ${file}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Descriptor ${file} is not valid YAML: ${reason}`, { cause: error });
  }

  const result = DescriptorSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Descriptor ${file} is invalid: ${issues}`, { cause: result.error });
  }

  return result.data;
}

/**
 * Compare the stamped version with the caller's version.
 *
 * @returns An advisory when both are known and differ
 */
export function checkVersion(build: ServerBuildInfo, currentVersion?: string): Advisory | null {
  if (currentVersion === undefined || currentVersion === build.versionTag) {
    return null;
  }
  return {
    kind: 'version-mismatch',
    message:
      `the target optimizer was built with a different version of opengen (${build.versionTag}); ` +
      `you are running version ${currentVersion}`,
  };
}

/**
 * Resolve connection details from a descriptor or an explicit endpoint.
 *
 * @throws {ConfigError} If both or neither alternative is given, or the
 *   descriptor cannot be used
 *
 * @example
 * ```typescript
 * const { details } = resolveConnectionDetails({ path: './my_optimizer' });
 * console.log(`${details.host}:${details.port}`);
 * ```
 */
export function resolveConnectionDetails(input: ConnectionInput): ResolvedConnection {
  const hasPath = input.path !== undefined;
  const hasEndpoint = input.host !== undefined || input.port !== undefined;

  if (hasPath && hasEndpoint) {
    throw new ConfigError('Give either an optimizer path or a host and port, not both');
  }

  if (input.path !== undefined) {
    const descriptor = loadDescriptor(input.path);
    const build: ServerBuildInfo = {
      componentName: descriptor.meta.optimizer_name,
      buildMode: descriptor.build.build_mode,
      versionTag: descriptor.build.opengen_version,
    };
    const details: ConnectionDetails = Object.freeze({
      host: descriptor.tcp.ip,
      port: descriptor.tcp.port,
      source: Object.freeze({ kind: 'local' as const, path: input.path }),
      build: Object.freeze(build),
    });
    logger.info(`TCP/IP details: ${details.host}:${details.port}`);

    const advisory = checkVersion(build, input.currentVersion);
    return { details, advisories: advisory ? [advisory] : [] };
  }

  if (input.host !== undefined && input.port !== undefined) {
    if (!Number.isInteger(input.port) || input.port < 1 || input.port > 65535) {
      throw new ConfigError(`Invalid port: ${input.port}`);
    }
    const details: ConnectionDetails = Object.freeze({
      host: input.host,
      port: input.port,
      source: Object.freeze({ kind: 'remote' as const }),
    });
    return { details, advisories: [] };
  }

  throw new ConfigError('Illegal arguments: give an optimizer path, or both a host and a port');
}
