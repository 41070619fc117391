import {defineConfig} from 'vitest/config';

export default defineConfig({
    test: {
        testTimeout: 10_000,
        include: ['packages/*/src/**/*.test.ts'],
        globals: true,
        clearMocks: false,
        restoreMocks: true,
    },
});
