import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        environment: 'node',
        globals: false,
        // Suites share tests/tmp on local disk
        fileParallelism: false,
    },
});
