/**
 * @fileoverview Tests for the CLI router.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Command, CommanderError } from 'commander';
import { createCLI } from './cli.js';

describe('createCLI', () => {
  it('should return a Command instance named optcp', () => {
    const cli = createCLI();

    expect(cli).toBeInstanceOf(Command);
    expect(cli.name()).toBe('optcp');
  });

  it('registers every subcommand', () => {
    const names = createCLI().commands.map((c) => c.name());

    expect(names).toEqual(['info', 'start', 'ping', 'call', 'kill', 'config']);
  });

  it('gives every server command the target options', () => {
    const cli = createCLI();

    for (const name of ['info', 'start', 'ping', 'call', 'kill']) {
      const command = cli.commands.find((c) => c.name() === name);
      const flags = command?.options.map((o) => o.long);
      expect(flags).toEqual(expect.arrayContaining(['--path', '--host', '--port', '--format', '--attempts']));
    }
  });

  describe('version', () => {
    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('prints the version', async () => {
      const writeStdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
      const cli = createCLI().exitOverride();

      await expect(cli.parseAsync(['--version'], { from: 'user' })).rejects.toThrow(CommanderError);
      expect(writeStdoutSpy).toHaveBeenCalledWith('0.1.0\n');
    });
  });
});
