/**
 * vitest.config.ts
 *
 * Test runner configuration. Server and client suites run in the node
 * environment; the client tests only exercise DOM-free helpers.
 */

import {defineConfig} from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['server/tests/**/*.test.ts', 'client/tests/**/*.test.ts'],
        // better-sqlite3 is a native addon; child processes keep it isolated per file
        pool: 'forks',
    },
});
