import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node', // Use node environment
    globals: true, // Enable globals like describe, it, expect
    coverage: {
      reporter: ['text', 'json', 'html'], // Coverage report formats
    },
    isolate: true, // Run tests in separate worker processes
    testTimeout: 30000, // PGlite's WASM boot can exceed the 5s default under parallel load
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
  },
});
