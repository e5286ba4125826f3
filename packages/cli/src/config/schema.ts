/**
 * Settings schema for the optcp CLI using Zod validation.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { logger } from '@optcp/core';

/**
 * Output format options.
 */
export const OutputFormatSchema = z.enum(['text', 'json', 'yaml']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

/**
 * Connection retry settings.
 */
export const RetryConfigSchema = z
  .object({
    /** Maximum number of connection attempts */
    attempts: z.number().int().positive().default(10),
    /** Fixed delay between attempts in milliseconds */
    delayMs: z.number().int().nonnegative().default(1000),
    /** Upper bound for a single attempt in milliseconds */
    connectTimeoutMs: z.number().int().positive().default(5000),
  })
  .default({});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

/**
 * Output configuration schema.
 */
export const OutputConfigSchema = z
  .object({
    /** Output format */
    format: OutputFormatSchema.default('text'),
  })
  .default({});

export type OutputConfig = z.infer<typeof OutputConfigSchema>;

/**
 * Complete optcp CLI settings schema.
 *
 * @example
 * ```yaml
 * path: python_build/rosenbrock
 * retry:
 *   attempts: 20
 *   delayMs: 500
 * output:
 *   format: yaml
 * ```
 */
export const ConfigSchema = z
  .object({
    /** Directory of a locally generated optimizer (contains optimizer.yml) */
    path: z.string().optional(),
    /** Host of a remote optimizer server */
    host: z.string().optional(),
    /** Port of a remote optimizer server */
    port: z.number().int().min(1).max(65535).optional(),
    /** Generator version to check descriptors against */
    currentVersion: z.string().optional(),
    /** Connection retry settings */
    retry: RetryConfigSchema,
    /** Wait after launching before the first ping, in milliseconds */
    settleDelayMs: z.number().int().nonnegative().default(2000),
    /** Read buffer length for call responses */
    bufferLength: z.number().int().positive().default(4096),
    /** Largest call response expected, in bytes */
    maxDataSize: z.number().int().positive().default(1048576),
    /** Output settings */
    output: OutputConfigSchema,
  })
  .default({});

/**
 * Inferred configuration type from schema.
 */
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration, logging any validation errors.
 *
 * @param data - Raw configuration data
 * @returns Validated configuration with defaults applied
 * @throws {z.ZodError} If validation fails
 */
export function parseConfig(data: unknown): Config {
  logger.debug('Parsing configuration...');
  try {
    const config = ConfigSchema.parse(data);
    logger.debug(`Config parsed: format=${config.output.format}, attempts=${config.retry.attempts}`);
    return config;
  } catch (error) {
    if (error instanceof z.ZodError) {
      logger.error(`Config validation failed: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Partial settings as written in a file or given as flags, before defaults.
 */
export type ConfigOverrides = NonNullable<z.input<typeof ConfigSchema>>;
