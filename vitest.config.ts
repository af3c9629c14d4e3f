import { defineConfig, type TestUserConfig } from 'vitest/config'
import { unitTestMinimalProject } from './configs/vitest.config.unit-minimal'

export function getReporters(): TestUserConfig['reporters'] {
  if (process.env.GITHUB_ACTIONS) return ['default', 'github-actions']
  return ['default']
}

export default defineConfig({
  test: {
    projects: [
      {
        extends: true,
        ...unitTestMinimalProject,
      },
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    env: {
      NODE_ENV: 'test',
    },
    clearMocks: true,
    teardownTimeout: 5_000,
    reporters: getReporters(),
  },
})
