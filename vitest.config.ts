import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@cutout-studio/types': fromRoot('./packages/types/src/index.ts'),
      '@cutout-studio/core': fromRoot('./packages/core/src/index.ts'),
      '@cutout-studio/matting': fromRoot('./packages/matting/src/index.ts'),
      '@cutout-studio/render': fromRoot('./packages/render/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts', 'packages/*/src/**/index.ts'],
    },
  },
});
