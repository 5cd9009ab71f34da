import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
