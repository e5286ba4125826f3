/**
 * @fileoverview Tests for the @optcp/cli public API.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import * as cli from './index.js';
import { startReplyServer, type ReplyServer } from '../test/fixtures/test-helpers.js';

describe('@optcp/cli exports', () => {
  it('exports the CLI factory and main', () => {
    expect(typeof cli.createCLI).toBe('function');
    expect(typeof cli.main).toBe('function');
  });

  it('exports the logger from core', () => {
    expect(typeof cli.logger.warn).toBe('function');
    expect(typeof cli.setLogLevel).toBe('function');
  });

  it('exports the formatters', () => {
    expect(cli.createFormatter('yaml')).toBeInstanceOf(cli.YamlFormatter);
  });
});

describe('main', () => {
  let server: ReplyServer | null = null;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (server) {
      await server.close();
      server = null;
    }
  });

  it('runs a subcommand from raw arguments', async () => {
    const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    server = await startReplyServer(() => '{"Pong":1}');

    await cli.main(['ping', '--host', '127.0.0.1', '--port', String(server.port), '--format', 'json']);

    expect(server.requests).toEqual(['{"Ping":1}']);
    expect(consoleLogSpy).toHaveBeenCalledWith('{\n  "Pong": 1\n}');
  });
});
