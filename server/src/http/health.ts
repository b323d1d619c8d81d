/**
 * health.ts
 *
 * Health endpoint reporting database reachability. Used by the dashboard's
 * health badge and by external orchestrators.
 */

import type {FastifyInstance} from 'fastify';
import type {AppContext} from './context.js';

export async function registerHealthRoutes(app: FastifyInstance, ctx: AppContext) {
    app.get('/api/health', async () => {
        const services = {database: false};
        try {
            services.database = ctx.database.ping();
        } catch (err) {
            app.log.error({err}, 'database ping failed');
        }
        const allHealthy = Object.values(services).every(Boolean);
        app.log.debug({allHealthy, services});
        return {ok: allHealthy, healthy: allHealthy, services};
    });
}
