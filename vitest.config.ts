import { fileURLToPath } from 'url'

import { defineConfig } from 'vitest/config'

function dir(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    // Mock cleanup settings (call history only; stub implementations survive)
    clearMocks: true,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts', 'tools/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        '**/types.ts',
        '**/index.ts',
        'tools/growspace-replay/replay.ts',
      ],
    },

    include: ['src/**/*.test.ts', 'tools/**/*.test.ts'],
  },
  resolve: {
    alias: [
      { find: /^\$types\/(.*)$/, replacement: dir('./src/types/$1') },
      { find: /^\$test-utils\/(.*)$/, replacement: dir('./test/$1') },
      { find: /^@boot\/(.*)$/, replacement: dir('./src/boot/$1') },
      { find: /^@core\/(.*)$/, replacement: dir('./src/core/$1') },
      { find: /^@features\/(.*)$/, replacement: dir('./src/features/$1') },
      { find: /^@system\/(.*)$/, replacement: dir('./src/system/$1') },
      { find: /^@utils\/(.*)$/, replacement: dir('./src/utils/$1') },
      { find: /^@events(\/.*)?$/, replacement: dir('./src/events') + '$1' },
      { find: /^@logging$/, replacement: dir('./src/logging') },
      { find: /^@validation$/, replacement: dir('./src/validation') },
    ],
  },
})
