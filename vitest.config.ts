import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./app/select-widget', import.meta.url)),
    },
  },
  test: {
    environment: 'jsdom',
    include: ['app/*/tests/**/*.test.ts'],
    setupFiles: ['./app/select-widget/tests/vitest.setup.ts'],
  },
});
