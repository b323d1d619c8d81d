/**
 * aggregator.test.ts
 *
 * Collection statistics over hand-built snapshots.
 */

import {describe, it, expect} from 'vitest';
import {computeStats, percentage} from '../src/stats/aggregator.js';
import {card} from './helpers.js';

const CARDS = [
    card({id: 'charmander', name: 'Charmander', type: 'Fire', rarity: 'Common', setName: 'Base'}),
    card({id: 'charizard', name: 'Charizard', type: 'Fire', rarity: 'Rare', setName: 'Base'}),
    card({id: 'squirtle', name: 'Squirtle', type: 'Water', rarity: 'Common', setName: null}),
];

describe('percentage', () => {
    it('rounds to one decimal and is 0 for an empty total', () => {
        expect(percentage(1, 3)).toBe(33.3);
        expect(percentage(2, 3)).toBe(66.7);
        expect(percentage(0, 0)).toBe(0);
    });

    it('reads 100 only when nothing is missing', () => {
        expect(percentage(9999, 10000)).toBe(99.9);
        expect(percentage(10000, 10000)).toBe(100);
        expect(percentage(1, 20000)).toBe(0);
    });
});

describe('computeStats', () => {
    it('is all zeros for an empty catalog', () => {
        expect(computeStats({cards: [], ownedIds: new Set()})).toEqual({
            totalCards: 0,
            ownedCards: 0,
            missingCards: 0,
            percentage: 0,
            byType: [],
            byRarity: [],
            bySet: [],
        });
    });

    it('reports 0% with no ownership and 100% when everything is owned', () => {
        expect(computeStats({cards: CARDS, ownedIds: new Set()}).percentage).toBe(0);
        const all = computeStats({cards: CARDS, ownedIds: new Set(CARDS.map((c) => c.id))});
        expect(all.percentage).toBe(100);
        expect(all.missingCards).toBe(0);
    });

    it('groups by type, rarity and set', () => {
        const stats = computeStats({cards: CARDS, ownedIds: new Set(['charizard'])});
        expect(stats).toMatchObject({totalCards: 3, ownedCards: 1, missingCards: 2, percentage: 33.3});
        expect(stats.byType).toEqual([
            {key: 'Fire', total: 2, owned: 1, missing: 1, percentage: 50},
            {key: 'Water', total: 1, owned: 0, missing: 1, percentage: 0},
        ]);
        expect(stats.byRarity).toEqual([
            {key: 'Common', total: 2, owned: 0, missing: 2, percentage: 0},
            {key: 'Rare', total: 1, owned: 1, missing: 0, percentage: 100},
        ]);
        expect(stats.bySet).toEqual([
            {key: 'Base', total: 2, owned: 1, missing: 1, percentage: 50},
            {key: 'Unknown', total: 1, owned: 0, missing: 1, percentage: 0},
        ]);
    });

    it('ignores owned ids that are not in the catalog', () => {
        const stats = computeStats({cards: CARDS, ownedIds: new Set(['mew', 'squirtle'])});
        expect(stats.ownedCards).toBe(1);
        expect(stats.percentage).toBe(33.3);
    });
});
