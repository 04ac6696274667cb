import ts from 'typescript';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Vite's esbuild step renames shadowed function expressions and lowers
  // decorators differently from tsc, which changes `fn.name` and class names.
  // Transform test and source files with the TypeScript compiler instead.
  esbuild: false,
  plugins: [
    {
      name: 'typescript-transpile',
      enforce: 'pre',
      transform(code, id) {
        const file = id.split('?')[0];
        if (!/\.[cm]?tsx?$/.test(file)) return null;
        const out = ts.transpileModule(code, {
          fileName: file,
          compilerOptions: {
            target: ts.ScriptTarget.ES2022,
            module: ts.ModuleKind.ESNext,
            esModuleInterop: true,
            sourceMap: true,
            inlineSources: true,
          },
        });
        return { code: out.outputText, map: out.sourceMapText };
      },
    },
  ],
  test: {
    environment: 'node',
    include: ['framework/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'lcov'],
      include: ['framework/**/*.ts'],
      exclude: ['framework/**/__tests__/**'],
    },
  },
});
