/**
 * Vitest Configuration
 *
 * Every spec runs in process: no servers, no network. Tests that need
 * files create them under the OS temp directory.
 */

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
    resolve: {
        alias: {
            '@src': resolve(__dirname, './src'),
            '@spec': resolve(__dirname, './spec'),
        },
    },
    test: {
        globals: false,
        environment: 'node',

        // Only run tests in spec/ matching *.test.ts
        include: ['spec/**/*.test.ts'],
        exclude: [
            '**/node_modules/**',
            '**/dist/**',
        ],

        testTimeout: 5000,
        hookTimeout: 5000,
    },
});
