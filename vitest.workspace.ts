import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/summary/vitest.config.ts',
  'packages/cli/vitest.config.ts',
]);
