
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    exclude: ['dist/**/*', 'node_modules/**/*'],
    setupFiles: ['./src/test-setup.ts'],
    testTimeout: 60000,
    hookTimeout: 60000,
  },
});
