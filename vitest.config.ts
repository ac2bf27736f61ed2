import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const src = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@plinth/kernel': src('./packages/kernel/src/index.ts'),
      '@plinth/registry': src('./packages/registry/src/index.ts'),
      '@plinth/runtime-host': src('./packages/runtime-host/src/index.ts'),
      '@plinth/module-clone-distribution': src('./modules/first-party/clone-distribution/src/index.ts'),
      '@plinth/module-metadata-initializer': src('./modules/first-party/metadata-initializer/src/index.ts'),
    },
  },
  test: {
    include: [
      'packages/*/test/**/*.test.ts',
      'modules/first-party/*/test/**/*.test.ts',
    ],
    environment: 'node',
  },
});
