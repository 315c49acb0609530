import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@config': fromRoot('./src/config'),
      '@core': fromRoot('./src/core'),
      '@services': fromRoot('./src/services'),
      '@utils': fromRoot('./src/utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/tests/**/*.spec.ts'],
  },
});
