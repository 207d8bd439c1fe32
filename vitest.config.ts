import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.spec.ts'],
    setupFiles: ['tests/helpers/setup.ts'],
    environment: 'node',
    testTimeout: 20_000
  }
});
