import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    resolve: {
        alias: {
            libregroup: fileURLToPath(new URL('./packages/libregroup/src/index.ts', import.meta.url)),
        },
    },
    test: {
        include: ['packages/*/tests/**/*.test.ts'],
        environment: 'node',
    },
});
