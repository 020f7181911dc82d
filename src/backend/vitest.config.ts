import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'backend',
    environment: 'node',
    include: ['src/**/*.test.ts'],
    globals: false,
  },
})
