/**
 * importer.ts
 *
 * Turns an uploaded spreadsheet into card records. Parsing is partial-success:
 * a bad row is reported with its line number and the rest of the batch goes
 * through. Only a broken header (required columns absent) or an oversized
 * file rejects the batch as a whole.
 */

import type {CardRecord} from "../../../shared/types/card.js";
import type {ImportResult, RowError} from "../../../shared/types/collection.js";
import {deriveCardId} from "../catalog/cardId.js";
import type {CatalogStore} from "../catalog/store.js";
import {CsvFormatError} from "../errors.js";
import {cellValue, columnLayout, missingColumns, REQUIRED_COLUMNS, type RequiredColumn} from "./columns.js";
import {decodeCsv, parseCsv} from "./csv.js";

export type ParsedBatch = {
    records: CardRecord[];
    errors: RowError[];
    duplicates: number;
};

export type ImportOptions = {
    maxRows: number;
};

const DEFAULT_OPTIONS: ImportOptions = {maxRows: 10_000};

function parseJsonArray(value: string): unknown[] | null {
    try {
        const parsed: unknown = JSON.parse(value);
        return Array.isArray(parsed) ? parsed : null;
    } catch {
        return null;
    }
}

/**
 * A type cell may list several types (`["Fire","Water"]` or `Fire|Water`);
 * the first one is the card's type.
 */
export function primaryType(raw: string): string {
    const value = raw.trim();
    const list = value.startsWith("[") ? parseJsonArray(value) : null;
    const entries = list ? list.map((entry) => String(entry)) : value.split("|");
    return entries.map((entry) => entry.trim()).find((entry) => entry.length > 0) ?? "";
}

export async function parseCardCsv(
    input: string | Uint8Array,
    options: ImportOptions = DEFAULT_OPTIONS,
): Promise<ParsedBatch> {
    const text = decodeCsv(input);
    if (text.trim().length === 0) {
        throw new CsvFormatError("CSV is empty.");
    }

    const table = await parseCsv(text);
    const layout = columnLayout(table.headers);
    const missing = missingColumns(layout);
    if (missing.length > 0) {
        throw new CsvFormatError(`CSV is missing required columns: ${missing.join(", ")}.`);
    }
    if (table.rows.length > options.maxRows) {
        throw new CsvFormatError(`CSV too large. Max: ${options.maxRows} data rows.`);
    }

    const byId = new Map<string, CardRecord>();
    const errors: RowError[] = [];
    let duplicates = 0;

    table.rows.forEach((row, index) => {
        // header is line 1
        const line = index + 2;
        if (Object.values(row).every((value) => value.trim() === "")) return;

        const name = cellValue(row, layout, "name");
        const type = primaryType(cellValue(row, layout, "type"));
        const rarity = cellValue(row, layout, "rarity");

        const values: Record<RequiredColumn, string> = {name, type, rarity};
        const absent = REQUIRED_COLUMNS.filter((column) => values[column] === "");
        if (absent.length > 0) {
            errors.push({row: line, reason: absent.map((column) => `missing ${column}`).join(", ")});
            return;
        }

        const setName = cellValue(row, layout, "set") || null;
        const number = cellValue(row, layout, "number") || null;
        const id = deriveCardId({explicitId: cellValue(row, layout, "id"), name, setName, number});
        if (!id) {
            errors.push({row: line, reason: "cannot derive an id"});
            return;
        }

        if (byId.has(id)) {
            duplicates++;
            // keep the row position of the latest occurrence
            byId.delete(id);
        }
        byId.set(id, {
            id,
            name,
            type,
            rarity,
            imageFileName: cellValue(row, layout, "image") || null,
            setName,
            number,
        });
    });

    return {records: [...byId.values()], errors, duplicates};
}

export async function importCards(
    input: string | Uint8Array,
    store: CatalogStore,
    options: ImportOptions = DEFAULT_OPTIONS,
): Promise<ImportResult> {
    const batch = await parseCardCsv(input, options);
    const {created, updated} = store.upsert(batch.records);
    return {
        created,
        updated,
        skipped: batch.errors.length,
        duplicates: batch.duplicates,
        errors: batch.errors,
    };
}
