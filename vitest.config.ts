import { defineConfig } from 'vitest/config'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  // contracts/ and assets/ resolve against the project root
  root: __dirname,
  test: {
    include: ['src/**/*.test.ts', 'sdk/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    allowOnly: false,
    testTimeout: 15000,
    poolOptions: {
      threads: { singleThread: true }
    }
  }
})
