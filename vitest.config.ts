import { defineConfig } from 'vitest/config';

// Keep test runs quiet unless a test asks for log output explicitly
process.env.LOG_LEVEL ??= 'silent';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
