/**
 * index.ts
 *
 * Server entrypoint. Responsibilities:
 * - Read and validate the environment
 * - Optionally start OpenTelemetry
 * - Open the catalog database and build the Fastify application
 * - Provide graceful shutdown handlers for SIGINT / SIGTERM
 */

import Fastify from 'fastify';
import {loadConfig} from './config.js';
import {buildServer, createContext} from './app.js';
import {closeInfra, initInfra} from './db/infra.js';
import * as log from './logging.js';

const config = loadConfig();
log.setDebugLogging(config.logDebug);

let stopTelemetry: (() => Promise<void>) | null = null;
if (config.otelEnabled) {
    // Imported lazily so a plain run never loads the SDK
    const {startTelemetry} = await import('./observability/tracing.js');
    const sdk = startTelemetry();
    stopTelemetry = () => sdk.shutdown();
    log.info('opentelemetry started');
}

const app = Fastify({logger: {level: config.logLevel}});
const handle = initInfra(config.databasePath, app.log);
await buildServer(config, createContext(config, handle), app);

// Graceful shutdown: stop accepting requests, then close the database
const shutdown = async () => {
    app.log.info('shutting down...');
    await app.close().catch((e) => app.log.error({e}, 'fastify close failed'));
    closeInfra(handle, app.log);
    if (stopTelemetry) {
        await stopTelemetry().catch((e) => log.error('telemetry shutdown failed', e));
    }
    process.exit(0);
};
process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());

app.listen({port: config.port, host: config.host}).catch((e) => {
    app.log.error(e);
    process.exit(1);
});
