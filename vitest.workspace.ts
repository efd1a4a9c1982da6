import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/parquet/vitest.config.ts',
  'packages/sequelize/vitest.config.ts',
]);
