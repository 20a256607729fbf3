import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

const dirname = path.dirname(fileURLToPath(import.meta.url))

const resolveFromRoot = (...segments: string[]) =>
  path.resolve(dirname, ...segments)

export default defineConfig({
  resolve: {
    alias: {
      '@capiscript/compiler': resolveFromRoot('packages/compiler/src/index.ts'),
      '@capiscript/vm': resolveFromRoot('packages/vm/src/index.ts'),
      '@capiscript/debugger': resolveFromRoot('packages/debugger/src/index.ts')
    }
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts']
  }
})
