import { defineConfig } from 'tsup'

export default defineConfig({
  sourcemap: true,
  dts: true,
  minify: false,
  clean: true,
  format: ['esm', 'cjs'],
  outDir: 'dist',
})
