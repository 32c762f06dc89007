import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const src = (rel: string) => fileURLToPath(new URL(`./packages/${rel}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: '@mltriage/pickle/testing', replacement: src('pickle/src/testing.ts') },
      { find: '@mltriage/core', replacement: src('core/src/index.ts') },
      { find: '@mltriage/pickle', replacement: src('pickle/src/index.ts') },
      { find: '@mltriage/rules', replacement: src('rules/src/index.ts') },
      { find: '@mltriage/engines', replacement: src('engines/src/index.ts') },
      { find: '@mltriage/report', replacement: src('report/src/index.ts') },
      { find: '@mltriage/sarif', replacement: src('sarif/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 20000,
  },
});
