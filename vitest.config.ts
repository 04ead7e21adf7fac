import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
  },
  resolve: {
    alias: {
      '@matchgraph/agents': path.resolve(rootDir, 'agents/src'),
      '@matchgraph/core': path.resolve(rootDir, 'packages/core/src'),
      '@matchgraph/llm': path.resolve(rootDir, 'packages/llm/src'),
      '@matchgraph/schemas': path.resolve(rootDir, 'packages/schemas/src'),
    },
  },
});
