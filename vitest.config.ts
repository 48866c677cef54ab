/**
 * Vitest configuration for workos-sync
 *
 * Unit tests run against the in-process fake API (tests/helpers/fake-api.ts);
 * nothing reaches the network.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/unit/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Quiets the module logger and clears WORKOS_* variables
    setupFiles: ['./tests/setup.ts'],

    globals: true,
    environment: 'node',
    testTimeout: 10000,
  },
});
