import { defineConfig } from 'vite';

export default defineConfig({
  root: '.',
  build: {
    ssr: true,
    target: 'node20',
    outDir: 'dist',
    emptyOutDir: true,
    rollupOptions: {
      input: {
        index: 'src/index.ts',
        bin: 'src/bin.ts'
      },
      output: {
        format: 'es',
        entryFileNames: '[name].js'
      }
    }
  }
});
