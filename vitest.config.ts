import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['__tests__/**/*.test.ts', 'packages/*/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['./vitest.setup.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', '**/__tests__'],
    },
    testTimeout: 10000,
    pool: 'forks',
    teardownTimeout: 5000,
  },
  resolve: {
    alias: {
      '@routegraph/agent-core': path.resolve(__dirname, './packages/agent-core/src/index.ts'),
      '@routegraph/inference-adapter': path.resolve(
        __dirname,
        './packages/inference-adapter/src/index.ts'
      ),
    },
  },
});
