/**
 * api.test.ts
 *
 * Fetch wrappers against a stubbed `fetch`: query strings, request bodies,
 * response parsing and the mapping of failures onto `ApiError`.
 */

import {afterEach, beforeEach, describe, it, expect, vi} from 'vitest';
import {ApiError, cardQuery, fetchCards, fetchStats, importCsv, toggleOwned} from '../src/net/api';

const fetchMock = vi.fn();

function jsonResponse(body: unknown, status = 200) {
    return new Response(JSON.stringify(body), {status, headers: {'content-type': 'application/json'}});
}

async function failure(promise: Promise<unknown>): Promise<ApiError> {
    try {
        await promise;
    } catch (e) {
        if (e instanceof ApiError) return e;
        throw e;
    }
    throw new Error('expected the request to fail');
}

const pikachu = {
    id: 'base:pikachu',
    name: 'Pikachu',
    type: 'Electric',
    rarity: 'Common',
    imageFileName: 'pikachu.png',
    setName: 'Base',
    number: null,
    owned: false,
    thumbnailUrl: '/images/pikachu.png',
};

beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
    vi.unstubAllGlobals();
});

describe('cardQuery', () => {
    it('omits unset filters', () => {
        expect(cardQuery({})).toBe('');
        expect(cardQuery({rarity: 'Rare', owned: false, limit: 24, offset: 48}))
            .toBe('?rarity=Rare&owned=false&limit=24&offset=48');
    });
});

describe('api', () => {
    it('lists cards with the filters as query parameters', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ok: true, cards: [pikachu], total: 1}));

        const page = await fetchCards({q: 'pika', limit: 24, offset: 0});

        expect(fetchMock).toHaveBeenCalledWith('/api/cards?q=pika&limit=24&offset=0', {
            method: 'GET',
            headers: {accept: 'application/json'},
            body: undefined,
        });
        expect(page.total).toBe(1);
        expect(page.cards[0]).toEqual(pikachu);
    });

    it('posts the sheet as text/csv and returns the import result', async () => {
        const result = {created: 1, updated: 0, skipped: 1, duplicates: 0, errors: [{row: 3, reason: 'missing name'}]};
        fetchMock.mockResolvedValue(jsonResponse({ok: true, result}));
        const csv = 'Name,Type,Rarity\nPikachu,Electric,Common\n,Fire,Rare\n';

        await expect(importCsv(csv)).resolves.toEqual(result);
        expect(fetchMock).toHaveBeenCalledWith('/api/import', {
            method: 'POST',
            headers: {accept: 'application/json', 'content-type': 'text/csv'},
            body: csv,
        });
    });

    it('uploads file bytes untouched as application/octet-stream', async () => {
        const result = {created: 1, updated: 0, skipped: 0, duplicates: 0, errors: []};
        fetchMock.mockResolvedValue(jsonResponse({ok: true, result}));
        // "Nome;Tipo;Raridade\nJoão;Água;Comum\n" in latin1
        const bytes = Uint8Array.from([
            ...Array.from('Nome;Tipo;Raridade\nJo', (ch) => ch.charCodeAt(0)), 0xe3, 0x6f, 0x3b,
            0xc1, ...Array.from('gua;Comum\n', (ch) => ch.charCodeAt(0)),
        ]).buffer;

        await expect(importCsv(bytes)).resolves.toEqual(result);
        expect(fetchMock).toHaveBeenCalledWith('/api/import', {
            method: 'POST',
            headers: {accept: 'application/json', 'content-type': 'application/octet-stream'},
            body: bytes,
        });
    });

    it('returns the toggled card', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ok: true, card: {...pikachu, owned: true}}));

        const card = await toggleOwned('base:pikachu');

        expect(card.owned).toBe(true);
        expect(fetchMock.mock.calls[0]?.[0]).toBe('/api/cards/base%3Apikachu/ownership/toggle');
    });

    it('carries the server message and code of a failed request', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ok: false, error: 'NOT_FOUND', msg: 'card not found: nope'}, 404));

        const err = await failure(toggleOwned('nope'));

        expect(err.status).toBe(404);
        expect(err.code).toBe('NOT_FOUND');
        expect(err.message).toBe('card not found: nope');
    });

    it('joins validation issues when there is no message', async () => {
        fetchMock.mockResolvedValue(jsonResponse({
            ok: false,
            error: 'VALIDATION_ERROR',
            issues: [{code: 'invalid_type', message: 'Expected boolean, received string', path: ['owned']}],
        }, 400));

        const err = await failure(fetchCards({}));

        expect(err.status).toBe(400);
        expect(err.message).toBe('Expected boolean, received string');
    });

    it('reports an unreachable backend with status 0', async () => {
        fetchMock.mockRejectedValue(new TypeError('fetch failed'));

        const err = await failure(fetchStats());

        expect(err.status).toBe(0);
        expect(err.code).toBe('NETWORK_ERROR');
    });

    it('rejects a response that does not have the expected shape', async () => {
        fetchMock.mockResolvedValue(jsonResponse({ok: true}));

        const err = await failure(fetchStats());

        expect(err.code).toBe('BAD_RESPONSE');
        expect(err.status).toBe(200);
    });
});
