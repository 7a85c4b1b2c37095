import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packagesDir = fileURLToPath(new URL('./apps/ts/packages/', import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/ts/packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['apps/ts/packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/test-utils/**', '**/index.ts'],
    },
  },
  resolve: {
    alias: [
      { find: '@flexreport/shared', replacement: `${packagesDir}shared/src/index.ts` },
      { find: '@flexreport/clients-ts', replacement: `${packagesDir}clients-ts/src/index.ts` },
    ],
  },
});
