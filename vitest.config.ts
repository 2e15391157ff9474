import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration: every workspace package is a project with its
 * own vitest.config.ts, so a single `vitest run` covers the whole tree.
 */
export default defineConfig({
  test: {
    projects: ['packages/*'],
  },
});
