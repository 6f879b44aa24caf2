import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const root = (relative: string) => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
    resolve: {
        alias: [
            // Workspace packages resolve to their sources so tests need no build
            {
                find: '@parley/core/test-utils',
                replacement: root('./packages/core/src/logger/test-utils.ts'),
            },
            { find: /^@parley\/core$/, replacement: root('./packages/core/src/index.ts') },
            { find: /^@parley\/a2a$/, replacement: root('./packages/a2a/src/index.ts') },
        ],
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/**/*.test.ts'],
        watch: false,
        setupFiles: ['./vitest.setup.ts'],
    },
});
