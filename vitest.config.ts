import tsconfigPaths from 'vite-tsconfig-paths';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text'],
      include: ['packages/*/src/**'],
      exclude: ['**/*.test.ts', '**/*.schema.ts', '**/testing/**', 'packages/tools-pdf-mcp/src/index.ts'],
    },
  },
});
