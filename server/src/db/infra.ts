/**
 * infra.ts
 *
 * Opens and closes the infrastructure the server depends on (the SQLite
 * catalog database) and reports both through the Fastify logger.
 */

import type {FastifyBaseLogger} from 'fastify';
import {openDatabase, type DatabaseHandle} from './sqlite.js';

export function initInfra(databasePath: string, log: FastifyBaseLogger): DatabaseHandle {
    const handle = openDatabase(databasePath);
    if (!handle.ping()) {
        throw new Error(`database not responding: ${databasePath}`);
    }
    log.info({databasePath}, 'database ready');
    return handle;
}

export function closeInfra(handle: DatabaseHandle, log: FastifyBaseLogger) {
    log.info('closing infra...');
    try {
        handle.close();
    } catch (e) {
        log.error({e}, 'database close failed');
    }
}
