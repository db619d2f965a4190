/**
 * Vitest configuration for polydal
 *
 * Runs every unit test under tests/unit. Tests are fully in-process: the
 * MemoryBackend stands in for real storage engines.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],

    setupFiles: ['tests/setup.ts'],

    // Keep deterministic order for debugging
    sequence: {
      shuffle: false,
    },

    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/index.ts'],
    },
  },
})
