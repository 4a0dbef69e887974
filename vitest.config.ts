import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['plugins/*/test/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['plugins/*/src/**/*.ts'],
      exclude: ['plugins/*/src/cli.ts'],
    },
  },
});
