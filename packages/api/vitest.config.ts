import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'url'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
  },
  resolve: {
    alias: {
      '@fleetline/domain': fileURLToPath(new URL('../domain/src/index.ts', import.meta.url)),
    },
  },
})
