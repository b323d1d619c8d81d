/**
 * cardId.test.ts
 *
 * Unit tests for card id derivation: explicit ids win, otherwise name, set
 * and number are slugged and joined.
 */

import {describe, it, expect} from 'vitest';
import {deriveCardId, slugify} from '../src/catalog/cardId.js';

describe('slugify', () => {
    it('folds accents, case and punctuation', () => {
        expect(slugify('Pokémon Center')).toBe('pokemon-center');
        expect(slugify('  Mr. Mime!  ')).toBe('mr-mime');
    });
});

describe('deriveCardId', () => {
    it('uses a trimmed explicit id as-is', () => {
        expect(deriveCardId({explicitId: ' base1-4 ', name: 'Charizard'})).toBe('base1-4');
    });

    it('joins name, set and number when no explicit id is given', () => {
        expect(deriveCardId({name: 'Pokémon Center', setName: 'Base Set', number: '#58'}))
            .toBe('pokemon-center:base-set:58');
    });

    it('falls back to the name alone', () => {
        expect(deriveCardId({explicitId: '', name: 'Mr. Mime', setName: null})).toBe('mr-mime');
    });

    it('yields an empty id when nothing sluggable remains', () => {
        expect(deriveCardId({name: '!!!'})).toBe('');
    });
});
