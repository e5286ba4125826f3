/**
 * @fileoverview Tests for the CLI bin entry point.
 */

import { describe, it, expect } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const BIN_PATH = fileURLToPath(new URL('./optcp.ts', import.meta.url));

describe('bin/optcp entry point', () => {
  it('should have an optcp.ts file in the bin directory', () => {
    expect(existsSync(BIN_PATH)).toBe(true);
  });

  it('should have correct shebang and imports', () => {
    const content = readFileSync(BIN_PATH, 'utf-8');

    expect(content.startsWith('#!/usr/bin/env node')).toBe(true);
    expect(content).toContain("import { main, logger, setLogLevel } from '../src/index.js'");
    expect(content).toContain('main(process.argv.slice(2))');
  });

  it('should have main available for import', async () => {
    const { main } = await import('../src/index.js');
    expect(typeof main).toBe('function');
  });
});
