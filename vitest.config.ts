import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['*.test.ts', 'tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['*.ts', 'shared/**/*.ts', 'lib/**/*.ts', 'scripts/**/*.ts'],
      exclude: ['node_modules/**', 'tests/**', '**/*.test.ts', 'vitest.config.ts'],
    },
  },
});
