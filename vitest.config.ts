import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': new URL('src', import.meta.url).pathname,
      '@test': new URL('test', import.meta.url).pathname,
    },
  },
  test: {
    environment: 'node',
    exclude: ['node_modules/**', 'dist/**', 'test/tmp/**'],
    globals: true,
    // Base patterns - overridden by projects
    include: [],
    projects: [
      {
        extends: true,
        test: {
          exclude: ['src/**/__tests__/*.integration.test.ts'],
          include: ['src/**/__tests__/*.test.ts'],
          name: 'unit',
          setupFiles: ['test/setup/vitest-unit.setup.ts'],
          testTimeout: 5000,
        },
      },
      {
        extends: true,
        test: {
          include: ['src/**/__tests__/*.integration.test.ts'],
          name: 'integration',
          setupFiles: ['test/setup/vitest-integration.setup.ts'],
          testTimeout: 15_000,
        },
      },
    ],
  },
});
