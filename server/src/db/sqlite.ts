/**
 * sqlite.ts
 *
 * Opens the SQLite database behind the catalog and wraps it with drizzle.
 * Call `openDatabase` once per process (or per test with `:memory:`) and
 * `close` it on shutdown.
 */

import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import {drizzle, type BetterSQLite3Database} from "drizzle-orm/better-sqlite3";
import * as schema from "./schema.js";

export type CatalogDb = BetterSQLite3Database<typeof schema>;

export type DatabaseHandle = {
    db: CatalogDb;
    ping(): boolean;
    close(): void;
};

export function openDatabase(file: string): DatabaseHandle {
    if (file !== ":memory:") {
        fs.mkdirSync(path.dirname(path.resolve(file)), {recursive: true});
    }
    const sqlite = new Database(file);
    sqlite.pragma("journal_mode = WAL");
    sqlite.pragma("foreign_keys = ON");
    sqlite.exec(schema.createSchemaSql);

    return {
        db: drizzle(sqlite, {schema}),
        ping: () => sqlite.prepare("SELECT 1 AS ok").get() !== undefined,
        close: () => sqlite.close(),
    };
}
