/**
 * Vitest configuration for stack-upgrade-planner
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],

    exclude: ['**/node_modules/**', '**/dist/**'],

    testTimeout: 30000,

    // Enable globals for describe, it, expect
    globals: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/cli.ts'],
    },

    environment: 'node',

    typecheck: {
      enabled: false, // tsc --noEmit runs separately
    },
  },
});
