import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'packages/*/src/**/*.test.ts',
      'functions/*/src/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
    ],
  },
  resolve: {
    alias: [
      {
        find: /^@catalog\/catalog-core\/testing$/,
        replacement: workspace('./packages/catalog-core/src/testing/index.ts'),
      },
      {
        find: /^@catalog\/catalog-core$/,
        replacement: workspace('./packages/catalog-core/src/index.ts'),
      },
      {
        find: /^@catalog\/catalog-http\/testing$/,
        replacement: workspace('./packages/catalog-http/src/testing.ts'),
      },
      {
        find: /^@catalog\/catalog-http$/,
        replacement: workspace('./packages/catalog-http/src/index.ts'),
      },
    ],
  },
});
