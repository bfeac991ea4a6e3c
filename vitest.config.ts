import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['supervisor/test/**/*.test.ts'],
    environment: 'node',
  },
});
