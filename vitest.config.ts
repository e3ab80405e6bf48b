import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const entry = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages resolve to their TypeScript sources
      '@jailprof/profile-dsl': entry('./packages/profile-dsl/src/index.ts'),
      '@jailprof/profile-host': entry('./packages/profile-host/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
  },
});
