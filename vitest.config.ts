import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const fromRoot = (relativePath: string) =>
  fileURLToPath(new URL(relativePath, import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    poolOptions: {
      forks: {
        // Knex loads the .ts migrations through Node's own loader
        execArgv: ['--import', 'tsx'],
      },
    },
    include: ['test/**/*.test.ts'],
    setupFiles: ['./test/setup/msw-setup.ts'],
    globalSetup: './test/setup/global-setup.ts',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/test/**',
        '**/*.test.ts',
        '**/migrations/**',
      ],
      include: ['src/**/*.ts'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: [
      // Map .js imports to .ts files for path aliases
      {
        find: /^@root\/(.*)\.js$/,
        replacement: fromRoot('./src/$1.ts'),
      },
      {
        find: /^@services\/(.*)\.js$/,
        replacement: fromRoot('./src/services/$1.ts'),
      },
      {
        find: /^@plugins\/(.*)\.js$/,
        replacement: fromRoot('./src/plugins/$1.ts'),
      },
      {
        find: /^@utils\/(.*)\.js$/,
        replacement: fromRoot('./src/utils/$1.ts'),
      },
      {
        find: /^@schemas\/(.*)\.js$/,
        replacement: fromRoot('./src/schemas/$1.ts'),
      },
    ],
    extensions: ['.ts', '.js', '.json'],
  },
})
