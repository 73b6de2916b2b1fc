import { defineConfig, configDefaults } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['src/**/__tests__/**/*.test.ts'],
        exclude: [...configDefaults.exclude, 'dist/**'],
        coverage: {
            provider: 'v8',
            exclude: ['**/__tests__/**', '**/node_modules/**']
        }
    }
});
