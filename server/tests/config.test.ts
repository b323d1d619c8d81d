/**
 * config.test.ts
 *
 * Environment parsing defaults and validation.
 */

import {describe, it, expect} from 'vitest';
import {ZodError} from 'zod';
import {loadConfig} from '../src/config.js';

describe('loadConfig', () => {
    it('applies defaults for an empty environment', () => {
        expect(loadConfig({})).toEqual({
            port: 8080,
            host: '0.0.0.0',
            frontendOrigin: 'http://localhost:5173',
            databasePath: './data/collection.db',
            imagesDir: null,
            logLevel: 'warn',
            logDebug: false,
            importMaxRows: 10000,
            otelEnabled: false,
        });
    });

    it('coerces numbers and flags from strings', () => {
        const config = loadConfig({
            PORT: '9000',
            LOG_DEBUG: '1',
            OTEL_ENABLED: 'true',
            IMPORT_MAX_ROWS: '50',
            CARD_IMAGES_DIR: ' ./pics ',
        });
        expect(config).toMatchObject({
            port: 9000,
            logDebug: true,
            otelEnabled: true,
            importMaxRows: 50,
            imagesDir: './pics',
        });
    });

    it('rejects invalid values', () => {
        expect(() => loadConfig({PORT: 'abc'})).toThrow(ZodError);
        expect(() => loadConfig({FASTIFY_LOG_LEVEL: 'loud'})).toThrow(ZodError);
    });
});
