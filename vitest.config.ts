import { defineConfig } from 'vitest/config';
import { resolve } from 'path';
import { fileURLToPath } from 'url';

const root = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  // Path aliases matching tsconfig
  resolve: {
    alias: {
      '@core': resolve(root, 'packages/core/src'),
      '@api': resolve(root, 'packages/api/src'),
      '@wav': resolve(root, 'packages/wav/src'),
    },
  },

  test: {
    include: ['packages/*/src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    environment: 'node',
  },
});
