import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/nem12/vitest.config.ts',
  'packages/sql/vitest.config.ts',
  'packages/cli/vitest.config.ts',
]);
