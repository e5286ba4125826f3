/**
 * Settings loader using cosmiconfig for file discovery and Zod for validation.
 *
 * @module config/loader
 */

import { cosmiconfig } from 'cosmiconfig';
import { logger } from '@optcp/core';
import { ConfigSchema, parseConfig, type Config, type ConfigOverrides } from './schema.js';

/**
 * Search places for cosmiconfig to look for settings files.
 */
const SEARCH_PLACES = [
  '.optcprc',
  '.optcprc.json',
  '.optcprc.yaml',
  '.optcprc.yml',
  '.optcprc.js',
  '.optcprc.cjs',
  '.config/optcp/config.yaml',
  '.config/optcp/config.yml',
  '.config/optcp/config.json',
  'optcp.config.js',
  'optcp.config.cjs',
];

/**
 * Create a cosmiconfig explorer for optcp settings.
 */
function createExplorer() {
  return cosmiconfig('optcp', {
    searchPlaces: SEARCH_PLACES,
  });
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source taking precedence. Undefined source
 * values leave the target untouched.
 *
 * @param target - Base object
 * @param source - Object to merge (takes precedence)
 * @returns Merged object
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load settings from file or defaults.
 *
 * @param configPath - Explicit settings file path (optional)
 * @param searchFrom - Directory to search from (optional, defaults to cwd)
 * @returns Validated settings
 */
export async function loadConfig(
  configPath?: string,
  searchFrom?: string
): Promise<Config> {
  const explorer = createExplorer();

  logger.debug(`Loading config${configPath ? ` from: ${configPath}` : '...'}`);

  try {
    const result = configPath
      ? await explorer.load(configPath)
      : await explorer.search(searchFrom);

    if (result && !result.isEmpty) {
      logger.debug(`Config loaded from: ${result.filepath}`);

      // Warn about JS config files - they execute arbitrary code
      if (result.filepath.endsWith('.js') || result.filepath.endsWith('.cjs')) {
        logger.warn(
          `Loading config from JavaScript file: ${result.filepath}\n` +
            `  This is executing JavaScript code from this file.\n` +
            `  Only use .js config files from sources you trust.`
        );
      }

      return parseConfig(result.config);
    }

    logger.debug('No config file found, using defaults');
    return parseConfig({});
  } catch (error) {
    if (error instanceof Error) {
      logger.error(`Failed to load config: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Get the path to the active settings file, if any.
 *
 * @param configPath - Explicit settings file path (optional)
 * @param searchFrom - Directory to search from (optional)
 * @returns Path to settings file, or null if none found
 */
export async function getConfigPath(
  configPath?: string,
  searchFrom?: string
): Promise<string | null> {
  if (configPath) {
    return configPath;
  }

  const explorer = createExplorer();

  try {
    const result = await explorer.search(searchFrom);
    return result && !result.isEmpty ? result.filepath : null;
  } catch (error) {
    logger.debug(`Config search failed: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/**
 * Merge file settings with CLI flag overrides.
 *
 * CLI flags take precedence over file settings. A target given on the
 * command line (a path, or a host and port) replaces the file's target
 * entirely, so the two never combine into an ambiguous pair.
 *
 * @param fileConfig - Settings loaded from file
 * @param cliFlags - Settings from CLI flags
 * @returns Merged and validated settings
 */
export function mergeConfig(fileConfig: ConfigOverrides, cliFlags: ConfigOverrides): Config {
  logger.debug('Merging file config with CLI flags');

  const base: Record<string, unknown> = { ...fileConfig };
  if (cliFlags.path !== undefined || cliFlags.host !== undefined || cliFlags.port !== undefined) {
    delete base.path;
    delete base.host;
    delete base.port;
  }

  const result = ConfigSchema.parse(deepMerge(base, cliFlags));

  logger.debug(
    `Merged config: target=${result.path ?? `${result.host}:${result.port}`}, format=${result.output.format}`
  );

  return result;
}

/**
 * Re-export types and utilities for convenience.
 */
export { ConfigSchema, type Config, type ConfigOverrides } from './schema.js';
