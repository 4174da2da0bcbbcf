import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    // fast-check defaults apply to every suite, not just tests/fuzz
    setupFiles: ['./tests/fuzz/setup.ts'],
    watch: false,
    testTimeout: 30000,
    pool: 'forks',
  },
})
