import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    env: {
      // Keep pino quiet; tests assert on return values, not log lines
      LOG_LEVEL: 'silent',
    },
  },
  resolve: {
    // Support .js extension imports in ESM TypeScript source
    extensions: ['.ts', '.js'],
  },
});
