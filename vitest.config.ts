import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

function packageEntry(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@chesslab/pgn': packageEntry('pgn'),
      '@chesslab/engine': packageEntry('engine'),
      '@chesslab/llm': packageEntry('llm'),
      '@chesslab/core': packageEntry('core'),
      '@chesslab/test-utils': packageEntry('test-utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 10000,
  },
});
