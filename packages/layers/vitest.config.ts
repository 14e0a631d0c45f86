import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'layers',
    retry: 0,
    exclude: ['node_modules', 'dist'],
  },
});
