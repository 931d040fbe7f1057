import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    // 1. Force Vitest to ignore build artifacts
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**'
    ],
    // 2. Ensure it only looks for source files
    include: ['packages/**/*.{test,spec}.ts'],
    environment: 'node'
  },
  // 3. Resolve the shared workspace package straight from its sources
  resolve: {
    alias: {
      '@metadata-writer/shared': fileURLToPath(new URL('./packages/shared/src/index.ts', import.meta.url))
    }
  }
});
