/// <reference types="vitest" />
import { defineConfig } from 'vitest/config'
import react from '@vitejs/plugin-react'
import { fileURLToPath } from 'node:url'

export default defineConfig({
  plugins: [react()],
  test: {
    // Enable globals for vi, describe, it, expect
    globals: true,

    // Use jsdom environment for DOM testing
    environment: 'jsdom',

    // Registers the library's matchers and React Testing Library cleanup
    setupFiles: ['./tests/setup/vitest.setup.ts'],

    include: ['tests/**/*.{test,spec}.{ts,tsx}'],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/coverage/**',
    ],

    testTimeout: 10000,
    hookTimeout: 10000,

    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true
      }
    },

    retry: 0,
    watch: false,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['**/*.d.ts', '**/*.config.*']
    },

    reporters: ['default']
  },

  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url))
    }
  }
})
