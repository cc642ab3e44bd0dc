import { defineConfig } from 'vitest/config';

// Day and week boundaries depend on the host zone; pin it so tests behave the same everywhere.
process.env.TZ = 'UTC';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
  },
});
