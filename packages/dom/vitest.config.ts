import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'dom',
    retry: 0,
    environment: 'jsdom',
    exclude: ['node_modules', 'dist'],
  },
});
