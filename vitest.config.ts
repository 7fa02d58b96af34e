/**
 * Vitest configuration for gatesync
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Enable globals for describe, it, expect
    globals: true,

    environment: 'node',

    // Tests never leave the process; stubbed globals are restored after each test
    unstubGlobals: true,
    restoreMocks: true,

    typecheck: {
      enabled: false, // use tsc --noEmit separately
    },
  },
});
