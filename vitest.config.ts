import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

// Workspace packages export their built output; tests run against the sources.
const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            '@habit-categorizer/shared': source('shared'),
            '@habit-categorizer/core': source('core'),
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
            exclude: ['packages/cli/src/index.ts'],
        },
    },
});
