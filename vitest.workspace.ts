import { defineWorkspace } from 'vitest/config'

export default defineWorkspace(['src/frontend/vite.config.ts', 'src/backend/vitest.config.ts'])
