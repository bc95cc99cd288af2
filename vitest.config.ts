import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    // fast-check defaults apply to the property suites under tests/fuzz
    setupFiles: ['./tests/fuzz/setup.ts'],
    testTimeout: 10000,
  },
})
