/**
 * @fileoverview Config command for the optcp CLI.
 *
 * Provides subcommands for viewing the merged settings and their file.
 *
 * @module commands/config
 */

import { Command } from 'commander';
import { stringify as yamlStringify } from 'yaml';
import { loadConfig, getConfigPath } from '../config/index.js';

/**
 * Create the config command with show and path subcommands.
 *
 * @returns Command instance for settings inspection
 *
 * @example
 * ```typescript
 * const program = new Command();
 * program.addCommand(createConfigCommand());
 * program.parse(['config', 'show']);
 * ```
 */
export function createConfigCommand(): Command {
  const config = new Command('config')
    .description(
      'View optcp settings\n\n' +
        'Settings are loaded from .optcprc.yaml, .optcprc.json, or optcp.config.js\n' +
        'files in the current directory or parent directories.\n\n' +
        'Examples:\n' +
        '  $ optcp config show\n' +
        '  $ optcp config path'
    );

  // config show - show resolved settings
  config
    .command('show')
    .description(
      'Show resolved settings as YAML\n\n' +
        'Displays the full settings with all defaults merged.'
    )
    .option('-c, --config <path>', 'Path to a specific settings file to load')
    .action(async (options: { config?: string }) => {
      try {
        const loadedConfig = await loadConfig(options.config);
        console.log(yamlStringify(loadedConfig));
      } catch (error) {
        if (error instanceof Error) {
          console.error(`Error: ${error.message}`);
        }
        process.exit(1);
      }
    });

  // config path - show settings file path
  config
    .command('path')
    .description(
      'Show settings file path\n\n' +
        'Displays the path to the discovered settings file, or indicates if none found.'
    )
    .option('-c, --config <path>', 'Path to a specific settings file to check')
    .action(async (options: { config?: string }) => {
      const configPath = await getConfigPath(options.config);
      if (configPath) {
        console.log(configPath);
      } else {
        console.log('no config file found');
      }
    });

  return config;
}
