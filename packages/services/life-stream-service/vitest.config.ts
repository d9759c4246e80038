import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    name: 'life-stream-service',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        branches: 60,
        functions: 75,
        lines: 75,
        statements: 75,
      },
    },
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
    },
  },
  resolve: {
    alias: {
      '@lifestream/platform-core': path.resolve(__dirname, '../../platform-core/src'),
      '@lifestream/shared-contracts': path.resolve(__dirname, '../../shared/contracts/src'),
      '@lifestream/test-utils': path.resolve(__dirname, '../../shared/test-utils/src'),
    },
  },
});
