import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const rootDir = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    poolOptions: {
      forks: {
        // @fastify/autoload imports plugin and route files natively
        execArgv: ['--import', 'tsx'],
      },
    },
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/test/**',
        '**/*.test.ts',
      ],
      include: ['src/**/*.ts'],
    },
    globalSetup: './test/setup/global-setup.ts',
    setupFiles: ['./test/setup/msw-setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: [
      // Map .js imports to .ts files for path aliases
      {
        find: /^@root\/(.*)\.js$/,
        replacement: path.resolve(rootDir, './src/$1.ts'),
      },
      {
        find: /^@services\/(.*)\.js$/,
        replacement: path.resolve(rootDir, './src/services/$1.ts'),
      },
      {
        find: /^@plugins\/(.*)\.js$/,
        replacement: path.resolve(rootDir, './src/plugins/$1.ts'),
      },
      {
        find: /^@utils\/(.*)\.js$/,
        replacement: path.resolve(rootDir, './src/utils/$1.ts'),
      },
      {
        find: /^@schemas\/(.*)\.js$/,
        replacement: path.resolve(rootDir, './src/schemas/$1.ts'),
      },
      // Regular aliases without .js extension
      { find: '@root', replacement: path.resolve(rootDir, './src') },
      {
        find: '@services',
        replacement: path.resolve(rootDir, './src/services'),
      },
      {
        find: '@plugins',
        replacement: path.resolve(rootDir, './src/plugins'),
      },
      { find: '@utils', replacement: path.resolve(rootDir, './src/utils') },
      {
        find: '@schemas',
        replacement: path.resolve(rootDir, './src/schemas'),
      },
    ],
    extensions: ['.ts', '.js', '.json'],
  },
})
