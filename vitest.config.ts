import { defineConfig } from 'vitest/config'

export default defineConfig(async () => {
  // `vite-tsconfig-paths` is ESM-only in recent releases; loading it via
  // dynamic import keeps the config loadable either way.
  const { default: tsconfigPaths } = await import('vite-tsconfig-paths')

  return {
    plugins: [tsconfigPaths()],
    test: {
      environment: 'node',
      include: ['src/**/*.test.ts'],
    },
  }
})
