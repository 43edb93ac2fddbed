import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // cd changes the process working directory, which worker threads cannot do
    pool: 'forks',
  },
});
