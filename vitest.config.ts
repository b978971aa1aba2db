import path from 'path';
import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

if (!process.stdout.isTTY && process.argv.some((arg) => /^(-w|--watch)(=|$)/.test(arg))) {
  console.error('Vitest watch mode cannot run without a TTY.');
  process.exit(1);
}

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    // Look for tests anywhere under packages/*
    include: ['packages/*/__tests__/**/*.test.ts'],
    setupFiles: [path.resolve(rootDir, 'vitest.setup.ts')],
    coverage: {
      enabled: false,
    },
  },
  resolve: {
    alias: {
      '@switchyard/llm': path.resolve(rootDir, 'packages/llm/src/index.ts'),
      '@switchyard/core': path.resolve(rootDir, 'packages/core/src/index.ts'),
    },
  },
});
