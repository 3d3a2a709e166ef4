import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/test/**/*.{test,spec}.ts', 'apps/*/test/**/*.{test,spec}.ts'],
  },
});
