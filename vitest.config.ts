import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/.git/**'],
    environment: 'node',
    globals: false,
  },
  resolve: {
    alias: [
      { find: '@shared', replacement: path.resolve(rootDir, 'shared') },
      // drizzle-kit's ESM build performs a dynamic require of "fs"; load its CommonJS build instead.
      { find: /^drizzle-kit\/api$/, replacement: path.resolve(rootDir, 'node_modules/drizzle-kit/api.js') },
    ],
  },
});
