/**
 * routes.ts
 *
 * Central HTTP route registration. Composes the individual route modules so
 * the server entrypoint (and the tests) can wire the whole HTTP surface with
 * a single `registerHttpRoutes(app, ctx)` call.
 */

import type {FastifyInstance} from 'fastify';
import type {AppContext} from './context.js';
import {registerHealthRoutes} from './health.js';
import {registerMetricsRoute} from './metrics.js';
import {registerCardRoutes} from './cards.js';
import {registerImportRoutes} from './import.js';
import {registerStatsRoutes} from './stats.js';

export async function registerHttpRoutes(app: FastifyInstance, ctx: AppContext) {
    await registerHealthRoutes(app, ctx);
    await registerMetricsRoute(app);
    await registerCardRoutes(app, ctx);
    await registerImportRoutes(app, ctx);
    await registerStatsRoutes(app, ctx);
}
