import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'url'

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        setupFiles: ['./tests/setup/globalSetup.ts'],
        testTimeout: 10000,
        hookTimeout: 10000,
        include: ['tests/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
    },
    resolve: {
        alias: {
            '~': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
})
