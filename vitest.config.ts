import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    include: ['packages/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.config.{ts,js}', 'scripts/'],
    },
  },
  resolve: {
    alias: {
      '@cancelfill/shared-core': fromRoot('./packages/shared-core/src'),
      '@cancelfill/shared-types': fromRoot('./packages/shared-types/src'),
      '@cancelfill/shared-firebase': fromRoot('./packages/shared-firebase/src'),
    },
  },
});
