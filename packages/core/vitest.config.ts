import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    retry: 0,
    exclude: ['node_modules', 'dist'],
  },
});
