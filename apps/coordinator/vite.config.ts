import { builtinModules } from 'node:module'
import { defineConfig } from 'vite'

const builtins = [...builtinModules, ...builtinModules.map((moduleName) => `node:${moduleName}`)]

const externals = Array.from(
  new Set([
    ...builtins,
    '@google-cloud/pubsub',
    '@google-cloud/storage',
    'js-yaml',
    'picocolors',
    'zod',
  ])
)

export default defineConfig({
  build: {
    target: 'node20',
    lib: {
      entry: 'src/datafaucet.ts',
      formats: ['es'],
      fileName: 'datafaucet',
    },
    rollupOptions: {
      external: externals,
    },
  },
})
