import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    name: 'platform-core',
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    env: {
      LOG_LEVEL: 'error',
    },
    include: ['src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@chipstream/shared-contracts': fileURLToPath(new URL('../shared/contracts/src', import.meta.url)),
    },
  },
});
