import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string) =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@results-archive/core': source('core'),
      '@results-archive/archive': source('archive'),
      '@results-archive/monitor': source('monitor'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    globals: false,
  },
});
