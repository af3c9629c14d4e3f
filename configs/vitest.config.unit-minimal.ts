import { defineProject } from 'vitest/config'

export const unitTestMinimalProject = defineProject({
  test: {
    name: 'unit',
    include: ['packages/**/test/unit/**/*.test.ts'],
    pool: 'forks',
    testTimeout: 10_000,
    env: {
      NODE_ENV: 'test',
    },
  },
})
