import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  {
    extends: './packages/server/vitest.config.ts',
    test: {
      name: 'server',
      root: './packages/server',
    },
  },
  {
    extends: './packages/shared/vitest.config.ts',
    test: {
      name: 'shared',
      root: './packages/shared',
    },
  },
]);
