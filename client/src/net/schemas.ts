/**
 * schemas.ts
 *
 * Runtime shapes of the backend's JSON responses. Every response is parsed
 * before it reaches the screens; one that does not match rejects with an
 * `ApiError`.
 */

import {z} from "zod";
import type {CardFacets, CardView} from "../../../shared/types/card.js";
import type {Breakdown, CollectionStats, ImportResult} from "../../../shared/types/collection.js";

export const cardViewSchema: z.ZodType<CardView> = z.object({
    id: z.string(),
    name: z.string(),
    type: z.string(),
    rarity: z.string(),
    imageFileName: z.string().nullable(),
    setName: z.string().nullable(),
    number: z.string().nullable(),
    owned: z.boolean(),
    thumbnailUrl: z.string().nullable(),
});

export const cardListSchema = z.object({
    cards: z.array(cardViewSchema),
    total: z.number().int(),
});

export const cardEnvelopeSchema = z.object({card: cardViewSchema});

export const facetsSchema: z.ZodType<CardFacets> = z.object({
    types: z.array(z.string()),
    rarities: z.array(z.string()),
    sets: z.array(z.string()),
});

export const importResultSchema: z.ZodType<ImportResult> = z.object({
    created: z.number().int(),
    updated: z.number().int(),
    skipped: z.number().int(),
    duplicates: z.number().int(),
    errors: z.array(z.object({row: z.number().int(), reason: z.string()})),
});

const breakdownSchema: z.ZodType<Breakdown> = z.object({
    key: z.string(),
    total: z.number().int(),
    owned: z.number().int(),
    missing: z.number().int(),
    percentage: z.number(),
});

export const statsSchema: z.ZodType<CollectionStats> = z.object({
    totalCards: z.number().int(),
    ownedCards: z.number().int(),
    missingCards: z.number().int(),
    percentage: z.number(),
    byType: z.array(breakdownSchema),
    byRarity: z.array(breakdownSchema),
    bySet: z.array(breakdownSchema),
});

export const healthSchema = z.object({
    ok: z.boolean(),
    services: z.object({database: z.boolean()}),
});

export const errorBodySchema = z.object({
    error: z.string().optional(),
    msg: z.string().optional(),
    issues: z.array(z.object({message: z.string()})).optional(),
});

export const importEnvelopeSchema = z.object({result: importResultSchema});

export const statsEnvelopeSchema = z.object({stats: statsSchema});
