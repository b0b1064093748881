import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['__tests__/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json', 'html'],
            include: ['src/**/*.ts', 'index.ts'],
            exclude: [
                '__tests__/**',
                'examples/**',
                'node_modules/**',
                'dist/**',
                '*.config.ts',
            ],
        },
        testTimeout: 10000,
        hookTimeout: 10000,
        pool: 'forks',
        reporters: ['default'],
        passWithNoTests: false,
    },
});
