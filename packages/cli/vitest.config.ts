import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cli',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/bin.ts'],
    },
  },
  resolve: {
    alias: {
      '@nem12sql/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
      '@nem12sql/nem12': fileURLToPath(new URL('../nem12/src/index.ts', import.meta.url)),
      '@nem12sql/sql': fileURLToPath(new URL('../sql/src/index.ts', import.meta.url)),
    },
  },
});
