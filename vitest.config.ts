import { defineConfig, mergeConfig } from 'vitest/config';
import { baseConfig } from './vitest.config.base.js';

/**
 * Default Vitest Configuration
 *
 * Runs ALL tests. For faster feedback use `npm run test:unit`.
 */
export default mergeConfig(
  baseConfig,
  defineConfig({
    test: {
      include: ['src/**/*.test.ts'],
      exclude: ['node_modules/', 'dist/'],
      testTimeout: 10000,
    },
  }),
);
