import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test patterns
    include: ['api/test/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Timeout configuration
    testTimeout: 10000,
    hookTimeout: 10000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './coverage',
      include: ['api/src/**/*.ts'],
      exclude: ['api/src/index.ts', 'api/src/types/**'],
    },

    watch: false,
  },
});
