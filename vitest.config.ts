import { defineConfig } from 'vitest/config';

process.env.NODE_NO_WARNINGS ??= '1';

/**
 * Vitest configuration for pv.
 *
 * Output is forced to plain ASCII without color, and the file logger is
 * switched off, so rendered text is the same on every machine.
 */
export default defineConfig({
  test: {
    globals: true,
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
    pool: 'forks',
    env: {
      NO_COLOR: '1',
      LANG: 'C',
      PV_LOG_LEVEL: 'silent',
    },
  },
});
