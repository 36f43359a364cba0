import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test_scripts/**/*.test.ts'],
    environment: 'node',
  },
});
