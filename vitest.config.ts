import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // Each integration test boots its own PGlite instance
    testTimeout: 20000,
    hookTimeout: 30000,
  },
});
