import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['src/**/__tests__/**/*.test.ts'],
        env: {
            SCHOLARSCAN_LOG_LEVEL: 'silent',
            SCHOLARSCAN_JSON_LOGS: '1',
        },
        testTimeout: 10000,
    },
});
