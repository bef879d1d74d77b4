import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'store-mongodb',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
