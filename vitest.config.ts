import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/src/**/*.test.ts'],
    // sharp work on large images is slow on CI machines
    testTimeout: 30_000,
    env: {
      OCR_LOG_LEVEL: 'silent',
    },
  },
});
