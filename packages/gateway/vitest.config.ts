/**
 * @file packages/gateway/vitest.config.ts
 * @description Test runner configuration for the gateway package.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true, // simplified usage of describe/it
    environment: 'node',
    setupFiles: ['reflect-metadata'],
    include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
    },
  },
});
