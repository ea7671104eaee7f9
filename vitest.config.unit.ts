import { defineConfig, mergeConfig } from 'vitest/config';
import { baseConfig } from './vitest.config.base.js';

/**
 * Unit Tests Configuration
 *
 * Fast in-process modules: geometry, policies, configuration, logging, hooks, cycle state.
 */
export default mergeConfig(
  baseConfig,
  defineConfig({
    test: {
      include: [
        'src/geometry/**/*.test.ts',
        'src/core/**/*.test.ts',
        'src/hooks/**/*.test.ts',
        'src/discussion/policy.test.ts',
        'src/meta-task/**/*.test.ts',
        'src/platforms/**/*.test.ts',
        'src/planning/__tests__/state.test.ts',
      ],
      exclude: ['node_modules/', 'dist/'],
      testTimeout: 5000,
    },
  }),
);
