import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'metadata-sequelize',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
