import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromHere = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    name: 'catalog-service',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    env: {
      LOG_LEVEL: 'error',
    },
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
  resolve: {
    alias: {
      '@chipstream/platform-core': fromHere('../../platform-core/src'),
      '@chipstream/shared-contracts': fromHere('../../shared/contracts/src'),
      '@chipstream/test-utils': fromHere('../../shared/test-utils/src'),
    },
  },
});
