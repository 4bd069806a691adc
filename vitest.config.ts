import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@stepgraph/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@stepgraph/engine': fileURLToPath(new URL('./packages/engine/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',

    // Include patterns
    include: ['packages/**/__tests__/**/*.test.ts'],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    pool: 'threads',
    fileParallelism: true,

    testTimeout: 30000,
    hookTimeout: 30000,

    watch: false,

    // ===================================================================
    // MOCKING & STUBBING
    // ===================================================================

    restoreMocks: true,
    clearMocks: true,
  },
});
