import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Silences the pino logger
    env: {
      NODE_ENV: 'test',
    },

    include: [
      'test/**/*.test.ts'
    ],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
    },

    silent: true,

    // Enable global APIs like describe, it, expect
    globals: true,

    testTimeout: 10000,
    retry: 0,
    reporters: ['default'],
    pool: 'threads',
  },
});
