/**
 * aggregator.ts
 *
 * Collection statistics computed from a catalog snapshot. Pure: the same
 * snapshot always yields the same numbers and nothing is written back.
 */

import type {CardRecord} from "../../../shared/types/card.js";
import type {Breakdown, CollectionStats} from "../../../shared/types/collection.js";
import type {CatalogSnapshot} from "../catalog/store.js";

export const UNKNOWN_KEY = "Unknown";

/**
 * Owned share in percent with one decimal; 0 for an empty total. Only a
 * complete collection reads 100.
 */
export function percentage(owned: number, total: number): number {
    if (total === 0) return 0;
    const rounded = Math.round((owned / total) * 1000) / 10;
    return owned < total ? Math.min(rounded, 99.9) : rounded;
}

function breakdown(
    cards: readonly CardRecord[],
    ownedIds: ReadonlySet<string>,
    keyOf: (card: CardRecord) => string | null,
): Breakdown[] {
    const groups = new Map<string, { total: number; owned: number }>();
    for (const card of cards) {
        const key = keyOf(card)?.trim() || UNKNOWN_KEY;
        const group = groups.get(key) ?? {total: 0, owned: 0};
        group.total++;
        if (ownedIds.has(card.id)) group.owned++;
        groups.set(key, group);
    }

    return [...groups.entries()]
        .map(([key, {total, owned}]) => ({
            key,
            total,
            owned,
            missing: total - owned,
            percentage: percentage(owned, total),
        }))
        .sort((a, b) => b.total - a.total || a.key.localeCompare(b.key));
}

export function computeStats({cards, ownedIds}: CatalogSnapshot): CollectionStats {
    const ownedCards = cards.filter((card) => ownedIds.has(card.id)).length;
    return {
        totalCards: cards.length,
        ownedCards,
        missingCards: cards.length - ownedCards,
        percentage: percentage(ownedCards, cards.length),
        byType: breakdown(cards, ownedIds, (card) => card.type),
        byRarity: breakdown(cards, ownedIds, (card) => card.rarity),
        bySet: breakdown(cards, ownedIds, (card) => card.setName),
    };
}
