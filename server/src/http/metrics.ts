/**
 * metrics.ts
 *
 * Prometheus metrics endpoint registration. Returns the current scrape output
 * with the content type of the metrics register.
 */

import type {FastifyInstance} from 'fastify';
import {register} from '../observability/metrics.js';

export async function registerMetricsRoute(app: FastifyInstance) {
    app.get('/metrics', async (_req, reply) => {
        try {
            reply.type(register.contentType);
            return await register.metrics();
        } catch (err) {
            app.log.error({err}, 'metrics scrape failed');
            return reply.code(500).send('metrics error');
        }
    });
}
