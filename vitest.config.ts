import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (path: string): string => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@imagegate/core': pkg('core/src/index.ts'),
      '@imagegate/cli': pkg('cli/src/cli.ts'),
      '@imagegate/api': pkg('api/src/server.ts'),
      '@imagegate/mcp': pkg('mcp/src/server.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
  },
});
