import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.spec.ts', 'packages/*/tests/**/*.spec.ts', 'apps/*/src/**/*.test.ts'],
  },
});
