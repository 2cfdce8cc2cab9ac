import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function source(pkg: string): string {
  return fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@pkbridge/backend-contracts': source('backend-contracts'),
      '@pkbridge/script-runtime': source('script-runtime'),
      '@pkbridge/backend-testing': source('backend-testing'),
      '@pkbridge/backend': source('backend'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.d.ts', '**/*.config.*', '**/__tests__/fixtures/**'],
    },
  },
});
