import { defineConfig } from 'vitest/config';
import { resolve } from 'path';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['packages/*/test/**/*.test.ts'],
        setupFiles: ['./test/setup.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/webkeep/src/index.ts', 'packages/cli/src/cli.ts'],
        },
    },
    resolve: {
        alias: {
            '@webkeep/capture': resolve('./packages/capture/src/index.ts'),
            '@webkeep/catalog': resolve('./packages/catalog/src/index.ts'),
            '@webkeep/cli': resolve('./packages/cli/src/index.ts'),
            '@webkeep/http': resolve('./packages/http/src/index.ts'),
            '@webkeep/library': resolve('./packages/library/src/index.ts'),
            '@webkeep/types': resolve('./packages/types/src/index.ts'),
            '@webkeep/utils': resolve('./packages/utils/src/index.ts'),
        },
    },
});
