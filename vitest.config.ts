import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/fuzz/setup.ts'],
    watch: false,
    // Property suites run FUZZ_ITERATIONS cases each
    testTimeout: 20000,
    pool: 'forks',
  },
})
