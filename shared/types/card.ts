/**
 * card.ts
 *
 * Card catalog shapes shared by the server and the dashboard. These are plain
 * serializable objects so they can travel as JSON without mapping.
 */

export type CardRecord = {
    // Stable identifier; explicit column value or derived from name + set
    id: string;
    name: string;
    type: string;
    rarity: string;
    // File name as written in the spreadsheet, null when the row had none
    imageFileName: string | null;
    setName: string | null;
    number: string | null;
};

export type CardView = CardRecord & {
    owned: boolean;
    // `/images/<file>` when the image exists on disk, otherwise null
    thumbnailUrl: string | null;
};

export type CardFilters = {
    q?: string;
    type?: string;
    rarity?: string;
    set?: string;
    owned?: boolean;
    limit?: number;
    offset?: number;
};

export type CardFacets = {
    types: string[];
    rarities: string[];
    sets: string[];
};
