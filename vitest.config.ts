import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@hostpulse/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url)),
      '@hostpulse/agent': fileURLToPath(new URL('./packages/agent/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    restoreMocks: false,
  },
});
