/**
 * Vitest Configuration
 *
 * - globals: true (describe/it/expect available without imports)
 * - environment: 'node'
 * - pool: 'forks' (os.set_cwd calls process.chdir, which worker threads reject)
 * - coverage: v8 provider with text, html, lcov reporters
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
    },
  },
});
