/**
 * collection.ts
 *
 * Import report and collection statistics returned by the backend.
 */

export type RowError = {
    // Spreadsheet line; the header is line 1
    row: number;
    reason: string;
};

export type ImportResult = {
    created: number;
    updated: number;
    skipped: number;
    // Rows overridden by a later row with the same id in the same batch
    duplicates: number;
    errors: RowError[];
};

export type Breakdown = {
    key: string;
    total: number;
    owned: number;
    missing: number;
    percentage: number;
};

export type CollectionStats = {
    totalCards: number;
    ownedCards: number;
    missingCards: number;
    // Percent with one decimal, 0 for an empty catalog
    percentage: number;
    byType: Breakdown[];
    byRarity: Breakdown[];
    bySet: Breakdown[];
};
