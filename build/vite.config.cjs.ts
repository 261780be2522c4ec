/**
 * Vite configuration for CommonJS build
 * Output: dist/cjs/
 */

import { defineConfig } from 'vite'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import dts from 'vite-plugin-dts'

const root = resolve(dirname(fileURLToPath(import.meta.url)), '..')

export default defineConfig({
  plugins: [
    dts({
      include: ['src/lib/**/*'],
      outDir: 'dist/cjs',
      entryRoot: 'src/lib',
      rollupTypes: false,
      tsconfigPath: './tsconfig.build.json'
    })
  ],
  build: {
    lib: {
      entry: resolve(root, 'src/lib/index.ts'),
      formats: ['cjs'],
      fileName: (_format, entryName) => `${entryName}.cjs`
    },
    outDir: resolve(root, 'dist/cjs'),
    emptyOutDir: true,
    sourcemap: true,
    minify: false,
    rollupOptions: {
      external: ['zod', /^@logtape\//, /^node:/],
      output: {
        format: 'cjs',
        preserveModules: true,
        preserveModulesRoot: 'src/lib',
        exports: 'named'
      }
    }
  }
})
