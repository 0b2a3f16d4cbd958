import { defineConfig } from 'vitest/config';
import path from 'node:path';

export default defineConfig(() => {
  const packageDir = import.meta.dirname;
  return {
    test: {
      include: [path.join(packageDir, 'tests', '**', '*.{test,e2e-spec}.ts')],
      exclude: [path.join(packageDir, '**', 'node_modules', '**'), path.join(packageDir, '**', 'dist', '**')],
      silent: false,
    },
    resolve: {
      alias: {
        '@': path.join(packageDir, 'src'),
      },
    },
  };
});
