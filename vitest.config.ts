import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    // Loading the wink model and the CMU dictionary takes a moment on first use
    testTimeout: 30000,
  },
});
