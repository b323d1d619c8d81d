/**
 * cards.ts
 *
 * Card catalog routes: filtered listing (name order), facets for the filter
 * widgets, single card read/create/update and the ownership toggle used by
 * the listing view.
 */

import type {FastifyInstance} from "fastify";
import type {CardView} from "../../../shared/types/card.js";
import {deriveCardId} from "../catalog/cardId.js";
import type {StoredCard} from "../catalog/store.js";
import {ValidationError} from "../errors.js";
import type {ImageResolver} from "../images/resolver.js";
import {catalogCardsGauge, ownershipChangesCounter} from "../observability/metrics.js";
import {
    cardCreateSchema,
    cardIdParamsSchema,
    cardPatchSchema,
    listQuerySchema,
    ownershipSchema,
} from "../schemas/cards.js";
import type {AppContext} from "./context.js";
import {sendError} from "./errors.js";

export function toCardView(card: StoredCard, images: ImageResolver): CardView {
    return {...card, thumbnailUrl: images.thumbnailFor(card)};
}

export async function registerCardRoutes(app: FastifyInstance, ctx: AppContext) {
    const {catalog, images} = ctx;

    app.get("/api/cards", async (req, reply) => {
        try {
            const filters = listQuerySchema.parse(req.query);
            const {cards, total} = catalog.list(filters);
            app.log.debug({filters, total}, "listed cards");
            return reply.send({ok: true, cards: cards.map((c) => toCardView(c, images)), total});
        } catch (err) {
            return sendError(app.log, reply, err, "list cards");
        }
    });

    app.get("/api/cards/facets", async (_req, reply) => {
        try {
            return reply.send({ok: true, ...catalog.facets()});
        } catch (err) {
            return sendError(app.log, reply, err, "load facets");
        }
    });

    app.get("/api/cards/:id", async (req, reply) => {
        try {
            const {id} = cardIdParamsSchema.parse(req.params);
            return reply.send({ok: true, card: toCardView(catalog.get(id), images)});
        } catch (err) {
            return sendError(app.log, reply, err, "get card");
        }
    });

    app.post("/api/cards", async (req, reply) => {
        try {
            const body = cardCreateSchema.parse(req.body);
            const id = deriveCardId({
                explicitId: body.id,
                name: body.name,
                setName: body.setName,
                number: body.number,
            });
            if (!id) throw new ValidationError("Cannot derive a card id from the given name.");
            const card = catalog.create({...body, id});
            catalogCardsGauge.set(catalog.count());
            app.log.info({cardId: card.id}, "card created");
            return reply.code(201).send({ok: true, card: toCardView(card, images)});
        } catch (err) {
            return sendError(app.log, reply, err, "create card");
        }
    });

    app.patch("/api/cards/:id", async (req, reply) => {
        try {
            const {id} = cardIdParamsSchema.parse(req.params);
            const patch = cardPatchSchema.parse(req.body ?? {});
            const card = catalog.update(id, patch);
            app.log.info({cardId: id, fields: Object.keys(patch)}, "card updated");
            return reply.send({ok: true, card: toCardView(card, images)});
        } catch (err) {
            return sendError(app.log, reply, err, "update card");
        }
    });

    app.put("/api/cards/:id/ownership", async (req, reply) => {
        try {
            const {id} = cardIdParamsSchema.parse(req.params);
            const {owned} = ownershipSchema.parse(req.body);
            const before = catalog.get(id);
            const card = catalog.setOwned(id, owned);
            if (before.owned !== card.owned) {
                ownershipChangesCounter.inc({owned: String(card.owned)});
            }
            return reply.send({ok: true, card: toCardView(card, images)});
        } catch (err) {
            return sendError(app.log, reply, err, "set ownership");
        }
    });

    app.post("/api/cards/:id/ownership/toggle", async (req, reply) => {
        try {
            const {id} = cardIdParamsSchema.parse(req.params);
            const card = catalog.toggleOwned(id);
            ownershipChangesCounter.inc({owned: String(card.owned)});
            return reply.send({ok: true, card: toCardView(card, images)});
        } catch (err) {
            return sendError(app.log, reply, err, "toggle ownership");
        }
    });
}
