import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    setupFiles: ['./packages/server/src/test/vitest.setup.ts'],
    globals: true,
  },
});
