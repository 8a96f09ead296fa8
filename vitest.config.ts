import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/__tests__/**/*.spec.ts'],
        env: {
            NODE_ENV: 'test',
            DB_PATH: ':memory:',
            JWT_SECRET: 'test-secret',
            LOG_LEVEL: 'silent',
        },
    },
});
