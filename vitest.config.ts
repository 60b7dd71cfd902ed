// Vitest configuration

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,

    environment: 'node',

    testTimeout: 10000,

    env: {
      LOG_TO_FILE: 'false',
      LOG_LEVEL: 'error',
    },

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/*.spec.ts',
        'shared-types/**',
        'backend/src/main.ts',
      ],
    },

    include: ['backend/src/**/*.{test,spec}.ts'],

    exclude: ['node_modules/', 'dist/'],
  },
});
