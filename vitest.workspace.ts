import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/import/vitest.config.ts',
  'packages/metadata-sequelize/vitest.config.ts',
  'packages/store-mongodb/vitest.config.ts',
  'packages/ai-openai/vitest.config.ts',
]);
