import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@bureau-insights/types': path.resolve(rootDir, 'packages/types/src/index.ts'),
      '@bureau-insights/report-parser': path.resolve(rootDir, 'packages/report-parser/src/index.ts'),
      '@bureau-insights/analysis': path.resolve(rootDir, 'packages/analysis/src/index.ts'),
      '@bureau-insights/output': path.resolve(rootDir, 'packages/output/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
