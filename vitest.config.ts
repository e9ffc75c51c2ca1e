import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['srcTest/**/*.test.ts'],
        environment: 'node',
    },
});
