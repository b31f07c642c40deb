import { defineConfig } from 'vitest/config';

process.env.NODE_NO_WARNINGS ??= '1';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
    pool: 'forks',
    env: {
      NO_COLOR: '1',
      TRELLIS_LOG_LEVEL: 'silent',
    },
  },
});
