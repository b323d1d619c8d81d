/**
 * schema.ts
 *
 * drizzle table definitions for the card catalog and the ownership marks.
 * `createSchemaSql` holds the matching DDL applied on start-up.
 */

import {sqliteTable, text, integer} from "drizzle-orm/sqlite-core";

export const cards = sqliteTable("cards", {
    id: text("id").primaryKey(),
    name: text("name").notNull(),
    type: text("type").notNull(),
    rarity: text("rarity").notNull(),
    imageFileName: text("image_file_name"),
    setName: text("set_name"),
    number: text("number"),
    createdAt: integer("created_at", {mode: "timestamp_ms"}).notNull(),
    updatedAt: integer("updated_at", {mode: "timestamp_ms"}).notNull(),
});

export const ownership = sqliteTable("ownership", {
    cardId: text("card_id")
        .primaryKey()
        .references(() => cards.id, {onDelete: "cascade"}),
    owned: integer("owned", {mode: "boolean"}).notNull(),
    updatedAt: integer("updated_at", {mode: "timestamp_ms"}).notNull(),
});

export type CardRow = typeof cards.$inferSelect;

export const createSchemaSql = `
CREATE TABLE IF NOT EXISTS cards (
    id TEXT PRIMARY KEY NOT NULL,
    name TEXT NOT NULL,
    type TEXT NOT NULL,
    rarity TEXT NOT NULL,
    image_file_name TEXT,
    set_name TEXT,
    number TEXT,
    created_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS cards_name_idx ON cards (name COLLATE NOCASE);
CREATE INDEX IF NOT EXISTS cards_rarity_idx ON cards (rarity);
CREATE INDEX IF NOT EXISTS cards_type_idx ON cards (type);
CREATE TABLE IF NOT EXISTS ownership (
    card_id TEXT PRIMARY KEY NOT NULL REFERENCES cards (id) ON DELETE CASCADE,
    owned INTEGER NOT NULL,
    updated_at INTEGER NOT NULL
);
`;
