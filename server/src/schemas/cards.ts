/**
 * cards.ts
 *
 * Zod schemas for the card and import endpoints. Query strings arrive as
 * strings, so numeric and boolean filters are coerced here.
 */

import {z} from "zod";

const optionalText = z
    .string()
    .trim()
    .max(200)
    .optional()
    .transform((value) => (value ? value : undefined));

const nullableText = z
    .string()
    .trim()
    .max(200)
    .nullish()
    .transform((value) => (value ? value : null));

// Present-but-empty clears the field
const clearableText = z
    .string()
    .trim()
    .max(200)
    .nullable()
    .transform((value) => (value ? value : null));

export const listQuerySchema = z.object({
    q: optionalText,
    type: optionalText,
    rarity: optionalText,
    set: optionalText,
    owned: z
        .enum(["true", "false"])
        .optional()
        .transform((value) => (value === undefined ? undefined : value === "true")),
    limit: z.coerce.number().int().min(1).max(500).optional(),
    offset: z.coerce.number().int().min(0).optional(),
});

export const cardIdParamsSchema = z.object({
    id: z.string().trim().min(1).max(200),
});

export const cardCreateSchema = z.object({
    id: z.string().trim().min(1).max(200).optional(),
    name: z.string().trim().min(1).max(200),
    type: z.string().trim().min(1).max(100),
    rarity: z.string().trim().min(1).max(100),
    imageFileName: nullableText,
    setName: nullableText,
    number: nullableText,
});

export const cardPatchSchema = z
    .object({
        name: z.string().trim().min(1).max(200),
        type: z.string().trim().min(1).max(100),
        rarity: z.string().trim().min(1).max(100),
        imageFileName: clearableText,
        setName: clearableText,
        number: clearableText,
    })
    .partial()
    .strict();

export const ownershipSchema = z.object({
    owned: z.boolean(),
});

export const importBodySchema = z.object({
    csv: z.string().min(1, {message: "CSV content is required."}),
});
