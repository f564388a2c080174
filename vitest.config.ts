import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/__tests__/**/*.test.ts'],
    // Commit dates render in local time; pin it so expectations are exact
    env: { TZ: 'UTC' },
  },
})
