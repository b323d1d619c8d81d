/**
 * import.ts
 *
 * CSV import endpoint. Accepts the sheet as JSON (`{csv: "..."}`), as a raw
 * `text/csv` body or as raw bytes (`application/octet-stream`, decoded with
 * the latin1 fallback). Row errors come back in the result; only an
 * unreadable sheet fails the request.
 */

import type {FastifyInstance} from "fastify";
import {importCards} from "../importer/importer.js";
import {
    cardsImportedCounter,
    catalogCardsGauge,
    importRowsRejectedCounter,
} from "../observability/metrics.js";
import {importBodySchema} from "../schemas/cards.js";
import type {AppContext} from "./context.js";
import {sendError} from "./errors.js";

const IMPORT_BODY_LIMIT = 10 * 1024 * 1024;

function csvPayload(body: unknown): string | Uint8Array {
    if (typeof body === "string" || body instanceof Uint8Array) return body;
    return importBodySchema.parse(body).csv;
}

export async function registerImportRoutes(app: FastifyInstance, ctx: AppContext) {
    app.addContentTypeParser("text/csv", {parseAs: "string"}, (_req, body, done) => {
        done(null, body);
    });
    app.addContentTypeParser("application/octet-stream", {parseAs: "buffer"}, (_req, body, done) => {
        done(null, body);
    });

    app.post("/api/import", {bodyLimit: IMPORT_BODY_LIMIT}, async (req, reply) => {
        try {
            const result = await importCards(csvPayload(req.body), ctx.catalog, ctx.importOptions);

            cardsImportedCounter.inc({outcome: "created"}, result.created);
            cardsImportedCounter.inc({outcome: "updated"}, result.updated);
            importRowsRejectedCounter.inc(result.skipped);
            catalogCardsGauge.set(ctx.catalog.count());

            app.log.info({
                created: result.created,
                updated: result.updated,
                skipped: result.skipped,
                duplicates: result.duplicates,
            }, "csv import finished");
            return reply.send({ok: true, result});
        } catch (err) {
            return sendError(app.log, reply, err, "csv import");
        }
    });
}
