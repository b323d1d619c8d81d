/**
 * stats.ts
 *
 * Collection statistics: owned/missing counts and percentages overall and
 * per type, rarity and set.
 */

import type {FastifyInstance} from "fastify";
import {computeStats} from "../stats/aggregator.js";
import type {AppContext} from "./context.js";
import {sendError} from "./errors.js";

export async function registerStatsRoutes(app: FastifyInstance, ctx: AppContext) {
    app.get("/api/stats", async (_req, reply) => {
        try {
            const stats = computeStats(ctx.catalog.snapshot());
            return reply.send({ok: true, stats});
        } catch (err) {
            return sendError(app.log, reply, err, "compute stats");
        }
    });
}
