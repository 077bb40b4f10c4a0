import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['bridge/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15_000,
  },
});
