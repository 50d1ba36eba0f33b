import { defineConfig } from 'vitest/config';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

// Resolve @laneway/core straight to its sources so tests run without a build.
const root = dirname(fileURLToPath(import.meta.url));
const coreSrc = resolve(root, 'packages', 'laneway-core', 'src');

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@laneway\/core$/, replacement: resolve(coreSrc, 'index.ts') },
      { find: /^@laneway\/core\/(.*)$/, replacement: `${coreSrc}/$1.ts` },
    ],
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10_000,
    hookTimeout: 10_000,
  },
});
