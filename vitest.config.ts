import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: [
      'packages/platform-core/vitest.config.ts',
      'packages/shared/*/vitest.config.ts',
      'packages/services/*/vitest.config.ts',
    ],
    coverage: {
      provider: 'v8',
      reporter: ['text-summary'],
      reportsDirectory: './coverage',
      clean: true,
      include: ['packages/**/src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/node_modules/**', '**/main.ts', '**/index.ts'],
    },
  },
});
