import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@formveil/shared': resolve(__dirname, '../shared/src/index.ts'),
    },
  },
  test: {
    name: 'backend',
    environment: 'node',
    globals: true,
    clearMocks: true,
    include: ['src/**/*.test.ts'],
  },
});
