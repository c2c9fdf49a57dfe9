import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

function fromRoot(path: string): string {
  return fileURLToPath(new URL(path, import.meta.url))
}

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@commands$/, replacement: fromRoot('./src/commands/index.ts') },
      { find: /^@app\//, replacement: fromRoot('./src/app/') },
      { find: /^@commands\//, replacement: fromRoot('./src/commands/') },
      { find: /^@components\//, replacement: fromRoot('./src/ui/components/') },
      { find: /^@constants\//, replacement: fromRoot('./src/constants/') },
      { find: /^@core\//, replacement: fromRoot('./src/core/') },
      { find: /^@screens\//, replacement: fromRoot('./src/ui/screens/') },
      { find: /^@services\//, replacement: fromRoot('./src/services/') },
      { find: /^@tools\//, replacement: fromRoot('./src/tools/') },
      { find: /^@utils\//, replacement: fromRoot('./src/utils/') },
    ],
  },
  test: {
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
  },
})
