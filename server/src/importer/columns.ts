/**
 * columns.ts
 *
 * Header normalisation and alias table. Spreadsheets arrive with English or
 * Portuguese headers in any casing; everything is folded onto the canonical
 * card fields below.
 */

export type CardColumn = "id" | "name" | "type" | "rarity" | "image" | "set" | "number";

export const REQUIRED_COLUMNS = ["name", "type", "rarity"] as const satisfies readonly CardColumn[];

export type RequiredColumn = (typeof REQUIRED_COLUMNS)[number];

// Within a column, earlier aliases win when several headers carry a value
const ALIASES: ReadonlyArray<readonly [CardColumn, readonly string[]]> = [
    ["id", ["id", "cardid", "code", "cardcode"]],
    ["name", ["name", "nome", "cardname"]],
    ["type", ["type", "types", "tipo", "cardtype"]],
    ["rarity", ["rarity", "raridade"]],
    ["image", ["imagepath", "imagem", "image", "imagefile", "imagefilename", "img"]],
    ["set", ["set", "setname", "setid", "colecao", "conjunto", "expansao"]],
    ["number", ["number", "numero", "cardnumber", "no"]],
];

type AliasHit = { column: CardColumn; rank: number };

const LOOKUP = new Map<string, AliasHit>(
    ALIASES.flatMap(([column, aliases]) =>
        aliases.map((alias, rank): [string, AliasHit] => [alias, {column, rank}])),
);

/** Row keys of each column, preferred alias first, then left to right. */
export type ColumnLayout = ReadonlyMap<string, readonly string[]>;

export function normalizeHeader(header: string): string {
    return header
        .trim()
        .normalize("NFD")
        .replace(/[\u0300-\u036f]/g, "")
        .toLowerCase()
        .replace(/[\s_-]/g, "");
}

/** Maps a raw header onto its card column, or returns it normalised when unknown. */
export function mapHeader(header: string): string {
    const normalized = normalizeHeader(header);
    return LOOKUP.get(normalized)?.column ?? normalized;
}

/**
 * Groups the sheet's headers by column. Rows are keyed by header position
 * (see `parseCsv`), so `Name` and `Nome` in the same sheet both survive.
 */
export function columnLayout(headers: readonly string[]): ColumnLayout {
    const ranked = headers.map((header, index) => {
        const normalized = normalizeHeader(header);
        const hit = LOOKUP.get(normalized);
        return {key: String(index), column: hit?.column ?? normalized, rank: hit?.rank ?? 0, index};
    });
    ranked.sort((a, b) => a.rank - b.rank || a.index - b.index);

    const layout = new Map<string, string[]>();
    for (const {key, column} of ranked) {
        const keys = layout.get(column) ?? [];
        keys.push(key);
        layout.set(column, keys);
    }
    return layout;
}

/** First non-empty value among the headers mapped to `column`. */
export function cellValue(row: Readonly<Record<string, string>>, layout: ColumnLayout, column: CardColumn): string {
    for (const key of layout.get(column) ?? []) {
        const value = (row[key] ?? "").trim();
        if (value) return value;
    }
    return "";
}

export function missingColumns(layout: ColumnLayout): RequiredColumn[] {
    return REQUIRED_COLUMNS.filter((column) => !layout.has(column));
}
