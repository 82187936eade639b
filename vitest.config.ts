import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (entry: string) => fileURLToPath(new URL(entry, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@lookup-enums/shared': source('./packages/shared/src/index.ts'),
      '@lookup-enums/enum-generator': source('./packages/enum-generator/src/index.ts'),
      '@lookup-enums/db-introspector': source('./packages/db-introspector/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
