import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['packages/*/src/test/**/*.test.ts'],

    exclude: ['node_modules/**', 'dist/**'],

    // Quiets the module loggers unless PIPELINE_LOG_LEVEL asks otherwise
    setupFiles: ['./test/setup.ts'],

    testTimeout: 10000,
  },
});
