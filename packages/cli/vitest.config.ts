import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    name: 'cli',
    globals: false,
    environment: 'node',
    include: ['src/**/*.test.ts', 'bin/**/*.test.ts', 'test/**/*.test.ts'],
    testTimeout: 30000, // 30 seconds max per test
    hookTimeout: 30000, // 30 seconds max for beforeEach/afterEach
  },
  resolve: {
    alias: {
      '@optcp/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
});
