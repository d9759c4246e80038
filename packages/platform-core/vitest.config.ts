import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    name: 'platform-core',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@lifestream/shared-contracts': path.resolve(__dirname, '../shared/contracts/src'),
      '@lifestream/test-utils': path.resolve(__dirname, '../shared/test-utils/src'),
    },
  },
});
