import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared': path.resolve(root, 'src/shared'),
      '@core': path.resolve(root, 'src/reporting-core'),
      '@api': path.resolve(root, 'src/reporting-api'),
      '@worker': path.resolve(root, 'src/reporting-worker'),
      '@db': path.resolve(root, 'src/db'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
