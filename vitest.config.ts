import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.{test,spec}.ts', 'packages/*/tests/**/*.{test,spec}.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 15000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: ['node_modules/', 'dist/', 'tests/', 'packages/*/tests/', '**/*.config.*'],
    },
    setupFiles: ['./tests/setup.ts'],
  },
  resolve: {
    alias: {
      // Package aliases resolve to sources so tests need no build
      '@gpgpipe/core': fromRoot('./packages/gpgpipe-core/src/index.ts'),
      '@gpgpipe/node': fromRoot('./packages/gpgpipe-node/src/index.ts'),
      '@': fromRoot('./src'),
    },
  },
});
