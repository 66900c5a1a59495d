import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/*/src/**/*.test.ts', 'shared/src/**/*.test.ts'],
    restoreMocks: true,
  },
});
