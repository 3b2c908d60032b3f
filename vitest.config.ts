import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolvePackage = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@perch/shared': resolvePackage('./packages/shared/src/index.ts'),
            '@perch/core': resolvePackage('./packages/core/src/index.ts'),
        },
    },
    test: {
        include: ['packages/*/src/**/*.test.ts'],
        environment: 'node',
        env: {
            PERCH_LOG_LEVEL: 'silent',
        },
    },
});
