import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@octoblock/core': path.resolve(root, 'packages/core/src/index.ts'),
    },
  },
  test: {
    testTimeout: 30000,
    include: ['packages/*/src/test/**/*.test.ts'],
  },
});
