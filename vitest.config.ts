import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
    test: {
        include: ['test/unit/**/*.test.ts'],
        setupFiles: ['./test/setup.ts'],
        environment: 'node',
        env: {
            NODE_ENV: 'test',
        },
        clearMocks: true,
        restoreMocks: true,
    },
});
