import { defineConfig } from 'vitest/config'

export default defineConfig({
  // Use Vite's cacheDir (vitest cache.dir is deprecated)
  cacheDir: '.vitest-cache',
  test: {
    // Forks keep each test file's worker threads out of the runner's heap
    pool: 'forks',
    isolate: true,
    environment: 'node',

    // Setup files
    setupFiles: ['./src/__tests__/setup.ts'],

    // Test inclusion/exclusion
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/__tests__/**',
        'src/**/*.test.ts',
        'src/**/index.ts', // Barrel re-export files
      ],
      clean: true,
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    reporters: ['default'],
  },
})
