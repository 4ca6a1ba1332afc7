import path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@termshell/shared': path.resolve(__dirname, 'packages/shared/src'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/shared/src/**/*.test.ts', 'packages/window-controller/src/**/*.test.ts'],
  },
});
