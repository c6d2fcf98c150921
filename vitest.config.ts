import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: {
      '@tidewater/shared': packageSource('shared'),
      '@tidewater/core': packageSource('core'),
      '@tidewater/server': packageSource('server'),
      '@tidewater/agent': packageSource('agent'),
    },
  },
});
