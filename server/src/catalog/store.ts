/**
 * store.ts
 *
 * Catalog store and ownership tracker over the drizzle database. All writes
 * are last-write-wins; `upsert` runs in a single transaction so an import
 * either lands completely or not at all.
 */

import {and, asc, count, eq, inArray, isNull, or, sql, type SQL} from "drizzle-orm";
import type {CardFacets, CardFilters, CardRecord} from "../../../shared/types/card.js";
import {cards, ownership, type CardRow} from "../db/schema.js";
import type {CatalogDb} from "../db/sqlite.js";
import {ConflictError, NotFoundError} from "../errors.js";

export type StoredCard = CardRecord & { owned: boolean };

export type UpsertSummary = { created: number; updated: number };

export type ListResult = { cards: StoredCard[]; total: number };

export type CatalogSnapshot = { cards: CardRecord[]; ownedIds: Set<string> };

export type CardPatch = Partial<Omit<CardRecord, "id">>;

// SQLite caps bound parameters per statement
const ID_CHUNK = 500;

function escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

function toRecord(row: CardRow): CardRecord {
    return {
        id: row.id,
        name: row.name,
        type: row.type,
        rarity: row.rarity,
        imageFileName: row.imageFileName,
        setName: row.setName,
        number: row.number,
    };
}

function sortedValues(rows: { value: string | null }[]): string[] {
    return rows
        .map((row) => row.value)
        .filter((value): value is string => value !== null && value.length > 0)
        .sort((a, b) => a.localeCompare(b));
}

export class CatalogStore {
    constructor(private readonly db: CatalogDb) {
    }

    upsert(records: CardRecord[]): UpsertSummary {
        if (records.length === 0) return {created: 0, updated: 0};

        return this.db.transaction((tx) => {
            const existing = new Set<string>();
            const ids = records.map((r) => r.id);
            for (let i = 0; i < ids.length; i += ID_CHUNK) {
                const rows = tx
                    .select({id: cards.id})
                    .from(cards)
                    .where(inArray(cards.id, ids.slice(i, i + ID_CHUNK)))
                    .all();
                for (const row of rows) existing.add(row.id);
            }

            const now = new Date();
            let created = 0;
            let updated = 0;
            for (const record of records) {
                const values = {
                    name: record.name,
                    type: record.type,
                    rarity: record.rarity,
                    imageFileName: record.imageFileName,
                    setName: record.setName,
                    number: record.number,
                    updatedAt: now,
                };
                tx.insert(cards)
                    .values({id: record.id, createdAt: now, ...values})
                    .onConflictDoUpdate({target: cards.id, set: values})
                    .run();
                if (existing.has(record.id)) {
                    updated++;
                } else {
                    created++;
                    existing.add(record.id);
                }
            }
            return {created, updated};
        });
    }

    create(record: CardRecord): StoredCard {
        if (this.find(record.id)) {
            throw new ConflictError(`Card already exists: ${record.id}`);
        }
        const now = new Date();
        this.db.insert(cards).values({...record, createdAt: now, updatedAt: now}).run();
        return this.get(record.id);
    }

    update(id: string, patch: CardPatch): StoredCard {
        this.get(id);
        this.db
            .update(cards)
            .set({...patch, updatedAt: new Date()})
            .where(eq(cards.id, id))
            .run();
        return this.get(id);
    }

    find(id: string): StoredCard | null {
        const row = this.db
            .select({card: cards, owned: ownership.owned})
            .from(cards)
            .leftJoin(ownership, eq(ownership.cardId, cards.id))
            .where(eq(cards.id, id))
            .get();
        if (!row) return null;
        return {...toRecord(row.card), owned: row.owned ?? false};
    }

    get(id: string): StoredCard {
        const card = this.find(id);
        if (!card) throw new NotFoundError("Card", id);
        return card;
    }

    list(filters: CardFilters = {}): ListResult {
        const conditions: SQL[] = [];
        const q = filters.q?.trim();
        if (q) {
            conditions.push(sql`${cards.name} LIKE ${`%${escapeLike(q)}%`} ESCAPE '\\'`);
        }
        if (filters.type) conditions.push(eq(cards.type, filters.type));
        if (filters.rarity) conditions.push(eq(cards.rarity, filters.rarity));
        if (filters.set) conditions.push(eq(cards.setName, filters.set));
        if (filters.owned === true) conditions.push(eq(ownership.owned, true));
        if (filters.owned === false) {
            const notOwned = or(isNull(ownership.owned), eq(ownership.owned, false));
            if (notOwned) conditions.push(notOwned);
        }
        const where = conditions.length > 0 ? and(...conditions) : undefined;

        const [{total}] = this.db
            .select({total: count()})
            .from(cards)
            .leftJoin(ownership, eq(ownership.cardId, cards.id))
            .where(where)
            .all();

        let query = this.db
            .select({card: cards, owned: ownership.owned})
            .from(cards)
            .leftJoin(ownership, eq(ownership.cardId, cards.id))
            .where(where)
            .orderBy(sql`${cards.name} COLLATE NOCASE`, asc(cards.id))
            .$dynamic();
        if (filters.limit !== undefined || filters.offset) {
            // OFFSET needs a LIMIT in front of it; drizzle omits a negative one
            query = query.limit(filters.limit ?? Number.MAX_SAFE_INTEGER).offset(filters.offset ?? 0);
        }

        const rows = query.all();
        return {
            cards: rows.map((row) => ({...toRecord(row.card), owned: row.owned ?? false})),
            total,
        };
    }

    setOwned(id: string, owned: boolean): StoredCard {
        const card = this.get(id);
        if (card.owned === owned) return card;

        const now = new Date();
        this.db
            .insert(ownership)
            .values({cardId: id, owned, updatedAt: now})
            .onConflictDoUpdate({target: ownership.cardId, set: {owned, updatedAt: now}})
            .run();
        return {...card, owned};
    }

    toggleOwned(id: string): StoredCard {
        const card = this.get(id);
        return this.setOwned(id, !card.owned);
    }

    count(): number {
        const [{total}] = this.db.select({total: count()}).from(cards).all();
        return total;
    }

    facets(): CardFacets {
        return {
            types: sortedValues(this.db.selectDistinct({value: cards.type}).from(cards).all()),
            rarities: sortedValues(this.db.selectDistinct({value: cards.rarity}).from(cards).all()),
            sets: sortedValues(this.db.selectDistinct({value: cards.setName}).from(cards).all()),
        };
    }

    snapshot(): CatalogSnapshot {
        const rows = this.db.select().from(cards).orderBy(asc(cards.name)).all();
        const owned = this.db
            .select({cardId: ownership.cardId})
            .from(ownership)
            .where(eq(ownership.owned, true))
            .all();
        return {
            cards: rows.map(toRecord),
            ownedIds: new Set(owned.map((row) => row.cardId)),
        };
    }
}
