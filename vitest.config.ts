import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@': path.resolve(rootDir, './src'),
    },
  },
  test: {
    setupFiles: ['./src/test/vitest.setup.ts'],
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
