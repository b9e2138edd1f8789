import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to their sources, no build needed
      '@exposure/kernel': source('kernel'),
      '@exposure/entitlement': source('entitlement'),
      '@exposure/fairplay': source('fairplay'),
      '@exposure/sdk': source('sdk'),
    },
  },
  test: {
    root: '.',
    include: ['packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
  },
});
