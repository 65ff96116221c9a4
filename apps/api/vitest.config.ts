import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    // Environment
    environment: 'node',
    globals: true,

    // Test files
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Timeout
    testTimeout: 10000,

    // Setup
    setupFiles: ['./test/setup.ts'],

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/test/**', '**/*.test.ts', '**/index.ts'],
    },
  },

  // Path aliases
  resolve: {
    alias: {
      '@yahrzeit-reminders/shared-types': path.resolve(__dirname, '../../packages/shared-types/src'),
    },
  },
});
