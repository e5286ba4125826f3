/**
 * @fileoverview Tests for config command.
 *
 * @module commands/config.test
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import { parse as yamlParse } from 'yaml';
import { logger } from '@optcp/core';
import { createConfigCommand } from './config.js';
import {
  createTempDir,
  mockCommandOutput,
  type CommandOutputSpies,
} from '../../test/fixtures/test-helpers.js';

describe('createConfigCommand', () => {
  let output: CommandOutputSpies;
  let tempDir: string;

  beforeEach(() => {
    output = mockCommandOutput();
    tempDir = createTempDir('optcp-config-cmd');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  async function run(args: string[]): Promise<void> {
    await new Command().addCommand(createConfigCommand()).parseAsync(args, { from: 'user' });
  }

  it('should be named "config"', () => {
    expect(createConfigCommand().name()).toBe('config');
  });

  it('should have show and path subcommands', () => {
    const names = createConfigCommand().commands.map((c) => c.name());
    expect(names).toEqual(['show', 'path']);
  });

  describe('show subcommand', () => {
    it('prints the merged settings as YAML', async () => {
      const configFile = path.join(tempDir, '.optcprc.yaml');
      fs.writeFileSync(configFile, 'host: 10.0.0.5\nport: 3301\n');

      await run(['config', 'show', '-c', configFile]);

      expect(output.log).toHaveBeenCalledTimes(1);
      expect(yamlParse(String(output.log.mock.calls[0]?.[0]))).toEqual({
        host: '10.0.0.5',
        port: 3301,
        retry: { attempts: 10, delayMs: 1000, connectTimeoutMs: 5000 },
        settleDelayMs: 2000,
        bufferLength: 4096,
        maxDataSize: 1048576,
        output: { format: 'text' },
      });
    });

    it('exits with 1 when the file cannot be loaded', async () => {
      vi.spyOn(logger, 'error').mockImplementation(() => {});

      await run(['config', 'show', '-c', path.join(tempDir, 'missing.yaml')]);

      expect(output.error.mock.calls[0]?.[0]).toMatch(/^Error: /);
      expect(output.exit).toHaveBeenCalledWith(1);
    });
  });

  describe('path subcommand', () => {
    it('prints an explicit path', async () => {
      await run(['config', 'path', '-c', '/etc/optcp.yaml']);

      expect(output.log).toHaveBeenCalledWith('/etc/optcp.yaml');
    });

    it('reports when no file is found', async () => {
      vi.spyOn(process, 'cwd').mockReturnValue(tempDir);

      await run(['config', 'path']);

      expect(output.log).toHaveBeenCalledWith('no config file found');
    });
  });
});
