import { defineConfig } from 'vitest/config';
import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { config } from 'dotenv';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

// Tests never read the developer's .env; an explicit test file is optional.
config({ path: resolve(rootDir, '.env.test') });

/**
 * Base Vitest configuration shared across all test types.
 *
 * Test Categories:
 * - Unit: Fast, isolated, pure modules (vitest.config.unit.ts)
 * - Default: Everything, including the cycle manager integration tests (vitest.config.ts)
 */
export const baseConfig = {
  test: {
    environment: 'node',
    coverage: {
      provider: 'v8' as const,
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/__tests__/**',
        '**/types.ts',
        'src/scripts/**',
      ],
    },
  },
};

export default defineConfig(baseConfig);
