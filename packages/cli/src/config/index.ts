/**
 * Settings module for the optcp CLI.
 *
 * @module config
 */

export {
  ConfigSchema,
  OutputFormatSchema,
  parseConfig,
  type Config,
  type ConfigOverrides,
  type OutputFormat,
  type RetryConfig,
  type OutputConfig,
} from './schema.js';

export { loadConfig, mergeConfig, getConfigPath } from './loader.js';
