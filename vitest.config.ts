import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tools/*/src/**/*.test.ts'],
    globals: false,
    environment: 'node',
    testTimeout: 30000,
    // Workspace packages resolve to their sources so tests need no build.
    alias: {
      '@wasm-spa/bundler': fileURLToPath(
        new URL('./packages/bundler/src/index.ts', import.meta.url),
      ),
    },
  },
});
