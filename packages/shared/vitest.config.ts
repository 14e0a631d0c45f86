import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'shared',
    retry: 0,
    exclude: ['node_modules', 'dist'],
  },
});
