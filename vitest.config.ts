import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['market-engine/src/**/__tests__/**/*.test.ts'],
        environment: 'node',
    },
});
