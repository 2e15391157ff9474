import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@schemasmith/core': new URL('../core/src/index.ts', import.meta.url)
        .pathname,
    },
  },
  test: {
    name: 'cli',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.{test,spec}.ts', 'src/__tests__/helpers.ts'],
    },
  },
});
