import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: false,
    include: ['spec/**/*.test.ts'],
    testTimeout: 10000
  }
});
