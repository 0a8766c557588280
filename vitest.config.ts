import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
    restoreMocks: true,
  },
  resolve: {
    alias: {
      '@sluice/types': pkg('./packages/types/src/index.ts'),
      '@sluice/store': pkg('./packages/store/src/index.ts'),
      '@sluice/order-manager': pkg('./packages/order-manager/src/index.ts'),
      '@sluice/metrics': pkg('./packages/metrics/src/index.ts'),
      '@sluice/execution-engine': pkg('./packages/execution-engine/src/index.ts'),
    },
  },
});
