import { defineConfig } from 'vitest/config';

// Each library load builds a TypeScript program, which takes a moment
export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
