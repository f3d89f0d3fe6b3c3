import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@irshot/raster': fileURLToPath(new URL('./packages/raster/src/index.ts', import.meta.url)),
      '@irshot/thermal': fileURLToPath(new URL('./packages/thermal/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
