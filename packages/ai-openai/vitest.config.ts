import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'ai-openai',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
