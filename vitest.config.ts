import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages export dist/ at run time; tests load their sources
const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@chat-ledger/shared': source('shared'),
            '@chat-ledger/core': source('core'),
        },
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/tests/**/*.test.ts'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html'],
            include: ['packages/*/src/**/*.ts'],
            exclude: ['packages/cli/src/index.ts', 'packages/cli/src/commands/**'],
        },
    },
});
