import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['viewport-interaction/src/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true
  }
});
