import { defineWorkspace } from 'vitest/config'

export default defineWorkspace([
  {
    test: {
      name: 'observability',
      root: './packages/observability',
      include: ['src/__tests__/**/*.test.ts'],
    },
  },
  {
    test: {
      name: 'bridge',
      root: './modules/bridge',
      include: ['src/__tests__/**/*.test.ts'],
    },
  },
  {
    test: {
      name: 'api',
      root: './apps/mcpmux-api',
      include: ['src/__tests__/**/*.test.ts'],
    },
  },
])
