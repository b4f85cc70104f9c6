import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@cascade-voice/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@cascade-voice/providers': fileURLToPath(
        new URL('./packages/providers/src/index.ts', import.meta.url)
      ),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
