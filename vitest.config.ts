import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolveFromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts', 'apps/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/__tests__/**',
        '**/__mocks__/**',
        '**/*.config.*',
        '**/index.ts',
        // Thin drivers over live services
        '**/neo4j-graph-store.ts',
        '**/snowflake-source.ts',
        '**/postgres-source.ts',
        '**/passcode-prompt.ts',
        '**/main.ts',
      ],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@clinigraph/types': resolveFromRoot('./packages/types/src/index.ts'),
      '@clinigraph/core': resolveFromRoot('./packages/core/src/index.ts'),
      '@clinigraph/domain': resolveFromRoot('./packages/domain/src/index.ts'),
      '@clinigraph/integrations': resolveFromRoot('./packages/integrations/src/index.ts'),
    },
  },
});
