import { builtinModules } from 'node:module'
import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'

export default defineConfig({
  plugins: [
    dts({
      insertTypesEntry: true,
      include: ['src/**/*'],
      exclude: ['src/**/*.test.ts', 'src/**/*.spec.ts']
    })
  ],
  build: {
    target: 'node20',
    lib: {
      entry: {
        index: 'src/index.ts',
        cli: 'src/cli.ts'
      },
      formats: ['es']
    },
    rollupOptions: {
      external: ['json5', ...builtinModules, ...builtinModules.map(name => `node:${name}`)]
    }
  }
})
