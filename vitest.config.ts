import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Suppress stdout from passing tests
    silent: process.env.VERBOSE_TESTS === 'true' ? false : 'passed-only',
    environment: 'node',
    // Tests drive the real git binary against temp repositories
    testTimeout: 30000,
    hookTimeout: 30000,
    env: {
      GIT_AUTHOR_NAME: 'Test User',
      GIT_AUTHOR_EMAIL: 'test@test.com',
      GIT_COMMITTER_NAME: 'Test User',
      GIT_COMMITTER_EMAIL: 'test@test.com',
      GIT_TERMINAL_PROMPT: '0',
      TREEPACK_CACHE_DIR: '',
      TREEPACK_DEFAULT_BRANCH: ''
    },
    coverage: {
      reporter: ['text', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        '**/*.config.*',
        'tests/**'
      ]
    },
    include: [
      'tests/**/*.{test,spec}.{js,ts}'
    ]
  }
});
