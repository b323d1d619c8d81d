/**
 * api.ts
 *
 * Fetch wrappers for the catalog backend. Every call resolves to a parsed
 * payload or rejects with an `ApiError`; the screens render that error's
 * message and never retry on their own.
 */

import type {z} from "zod";
import type {CardFacets, CardFilters, CardView} from "../../../shared/types/card.js";
import type {CollectionStats, ImportResult} from "../../../shared/types/collection.js";
import {debug} from "../core/log";
import {
    cardEnvelopeSchema,
    cardListSchema,
    errorBodySchema,
    facetsSchema,
    healthSchema,
    importEnvelopeSchema,
    statsEnvelopeSchema,
} from "./schemas";

export type HealthPayload = z.infer<typeof healthSchema>;
export type CardPage = z.infer<typeof cardListSchema>;

export class ApiError extends Error {
    constructor(
        readonly status: number,
        message: string,
        readonly code: string = "REQUEST_FAILED",
    ) {
        super(message);
        this.name = "ApiError";
    }
}

export function apiBase(): string {
    if (typeof window === "undefined") return "";
    return window.__CFG__?.API_URL ?? "";
}

type RequestOptions = {
    method?: "GET" | "POST" | "PUT" | "PATCH";
    json?: unknown;
    csv?: string;
    bytes?: ArrayBuffer;
};

function errorFromBody(status: number, body: unknown): ApiError {
    const parsed = errorBodySchema.safeParse(body);
    if (!parsed.success) return new ApiError(status, `Request failed (${status})`);
    const {error, msg, issues} = parsed.data;
    const message = msg ?? issues?.map((issue) => issue.message).join("; ") ?? error ?? `Request failed (${status})`;
    return new ApiError(status, message, error);
}

async function request<T>(path: string, schema: z.ZodType<T>, opts: RequestOptions = {}): Promise<T> {
    const headers: Record<string, string> = {accept: "application/json"};
    let body: string | ArrayBuffer | undefined;
    if (opts.bytes !== undefined) {
        // decoded on the server, which falls back to latin1
        headers["content-type"] = "application/octet-stream";
        body = opts.bytes;
    } else if (opts.csv !== undefined) {
        headers["content-type"] = "text/csv";
        body = opts.csv;
    } else if (opts.json !== undefined) {
        headers["content-type"] = "application/json";
        body = JSON.stringify(opts.json);
    }

    const url = `${apiBase()}${path}`;
    let res: Response;
    try {
        res = await fetch(url, {method: opts.method ?? "GET", headers, body});
    } catch (e) {
        debug("[api] network failure", url, e);
        throw new ApiError(0, "Backend unreachable. Is the server running?", "NETWORK_ERROR");
    }

    const data: unknown = await res.json().catch(() => null);
    if (!res.ok) throw errorFromBody(res.status, data);

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
        debug("[api] unexpected response", url, parsed.error.issues);
        throw new ApiError(res.status, "Unexpected response from server", "BAD_RESPONSE");
    }
    return parsed.data;
}

export function cardQuery(filters: CardFilters): string {
    const q = new URLSearchParams();
    if (filters.q) q.set("q", filters.q);
    if (filters.type) q.set("type", filters.type);
    if (filters.rarity) q.set("rarity", filters.rarity);
    if (filters.set) q.set("set", filters.set);
    if (filters.owned !== undefined) q.set("owned", String(filters.owned));
    if (filters.limit !== undefined) q.set("limit", String(filters.limit));
    if (filters.offset !== undefined) q.set("offset", String(filters.offset));
    const qs = q.toString();
    return qs ? `?${qs}` : "";
}

export function fetchCards(filters: CardFilters = {}): Promise<CardPage> {
    return request(`/api/cards${cardQuery(filters)}`, cardListSchema);
}

export function fetchFacets(): Promise<CardFacets> {
    return request("/api/cards/facets", facetsSchema);
}

export async function toggleOwned(id: string): Promise<CardView> {
    const {card} = await request(`/api/cards/${encodeURIComponent(id)}/ownership/toggle`, cardEnvelopeSchema, {
        method: "POST",
    });
    return card;
}

/**
 * Sends a sheet to the importer: pasted text as `text/csv`, an uploaded
 * file's raw bytes as `application/octet-stream`.
 */
export async function importCsv(sheet: string | ArrayBuffer): Promise<ImportResult> {
    const payload = typeof sheet === "string" ? {csv: sheet} : {bytes: sheet};
    const {result} = await request("/api/import", importEnvelopeSchema, {method: "POST", ...payload});
    return result;
}

export async function fetchStats(): Promise<CollectionStats> {
    const {stats} = await request("/api/stats", statsEnvelopeSchema);
    return stats;
}

export function fetchHealth(): Promise<HealthPayload> {
    return request("/api/health", healthSchema);
}
