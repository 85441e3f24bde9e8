import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.test.ts'],
        setupFiles: ['test/setup.ts'],
        env: {
            LOG_SILENT: 'true',
        },
        testTimeout: 10000,
    },
});
