/**
 * cards.http.test.ts
 *
 * HTTP-level tests for the card, import and stats routes. Each test wires a
 * fresh Fastify instance to an in-memory catalog and drives it with
 * `app.inject`.
 */

import path from 'node:path';
import Fastify, {type FastifyInstance} from 'fastify';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {registerHttpRoutes} from '../src/http/routes.js';
import {cardsImportedCounter} from '../src/observability/metrics.js';
import {createTestContext, makeTempDir, writeImage, type TestContext} from './helpers.js';

const SHEET = [
    'Name,Type,Rarity,Imagem',
    'Pikachu,Lightning,Common,pikachu.png',
    'Charizard,Fire,Rare,charizard.png',
    'Mewtwo,Psychic,,mewtwo.png',
    'Raichu,Lightning,Rare,unknown.png',
].join('\n');

let app: FastifyInstance;
let ctx: TestContext;

beforeEach(async () => {
    const cwd = makeTempDir();
    writeImage(path.join(cwd, 'images'), 'pikachu.png');
    ctx = createTestContext({cwd});
    app = Fastify();
    await registerHttpRoutes(app, ctx);
});

afterEach(async () => {
    await app.close();
    ctx.handle.close();
});

async function importSheet(csv = SHEET) {
    return app.inject({method: 'POST', url: '/api/import', payload: {csv}});
}

describe('POST /api/import', () => {
    it('imports valid rows and reports the malformed one', async () => {
        const res = await importSheet();
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({
            ok: true,
            result: {
                created: 3,
                updated: 0,
                skipped: 1,
                duplicates: 0,
                errors: [{row: 4, reason: 'missing rarity'}],
            },
        });
    });

    it('is idempotent on re-import', async () => {
        await importSheet();
        const res = await importSheet();
        expect(res.json().result).toMatchObject({created: 0, updated: 3});

        const list = await app.inject({method: 'GET', url: '/api/cards'});
        expect(list.json().total).toBe(3);
    });

    it('accepts a raw text/csv body', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/api/import',
            headers: {'content-type': 'text/csv'},
            payload: 'name;type;rarity\nEevee;Colorless;Common\n',
        });
        expect(res.statusCode).toBe(200);
        expect(res.json().result.created).toBe(1);
    });

    it('accepts raw latin1 bytes', async () => {
        const res = await app.inject({
            method: 'POST',
            url: '/api/import',
            headers: {'content-type': 'application/octet-stream'},
            payload: Buffer.from('name,type,rarity\nPokémon Ranger,Trainer,Uncommon\n', 'latin1'),
        });
        expect(res.statusCode).toBe(200);
        const card = await app.inject({method: 'GET', url: '/api/cards/pokemon-ranger'});
        expect(card.json().card.name).toBe('Pokémon Ranger');
    });

    it('answers 400 for a sheet without the required columns', async () => {
        const res = await importSheet('Name,Type\nPikachu,Lightning\n');
        expect(res.statusCode).toBe(400);
        expect(res.json()).toEqual({
            ok: false,
            error: 'CSV_FORMAT_ERROR',
            msg: 'CSV is missing required columns: rarity.',
        });
    });

    it('answers 400 when the JSON body has no csv', async () => {
        const res = await app.inject({method: 'POST', url: '/api/import', payload: {file: 'x'}});
        expect(res.statusCode).toBe(400);
        expect(res.json().error).toBe('VALIDATION_ERROR');
    });
});

describe('GET /api/cards', () => {
    beforeEach(async () => {
        await importSheet();
    });

    it('filters by rarity in name order', async () => {
        const res = await app.inject({method: 'GET', url: '/api/cards?rarity=Rare'});
        expect(res.statusCode).toBe(200);
        const body = res.json();
        expect(body.total).toBe(2);
        expect(body.cards.map((c: { name: string }) => c.name)).toEqual(['Charizard', 'Raichu']);
    });

    it('returns thumbnails only for images found on disk', async () => {
        const res = await app.inject({method: 'GET', url: '/api/cards?type=Lightning'});
        expect(res.json().cards).toEqual([
            {
                id: 'pikachu',
                name: 'Pikachu',
                type: 'Lightning',
                rarity: 'Common',
                imageFileName: 'pikachu.png',
                setName: null,
                number: null,
                owned: false,
                thumbnailUrl: '/images/pikachu.png',
            },
            {
                id: 'raichu',
                name: 'Raichu',
                type: 'Lightning',
                rarity: 'Rare',
                imageFileName: 'unknown.png',
                setName: null,
                number: null,
                owned: false,
                thumbnailUrl: null,
            },
        ]);
    });

    it('guesses the thumbnail from set and number when the row has no image', async () => {
        writeImage(path.join(ctx.cwd, 'images'), 'base1_58.png');
        await importSheet('Name,Type,Rarity,Set,Number\nPikachu,Lightning,Common,base1,58\n');

        const res = await app.inject({method: 'GET', url: '/api/cards/pikachu:base1:58'});
        expect(res.json().card).toMatchObject({imageFileName: null, thumbnailUrl: '/images/base1_58.png'});
    });

    it('skips cards with an offset and no limit', async () => {
        const res = await app.inject({method: 'GET', url: '/api/cards?offset=1'});
        expect(res.statusCode).toBe(200);
        const body = res.json();
        expect(body.total).toBe(3);
        expect(body.cards.map((c: { name: string }) => c.name)).toEqual(['Pikachu', 'Raichu']);
    });

    it('rejects a malformed query', async () => {
        const res = await app.inject({method: 'GET', url: '/api/cards?limit=0'});
        expect(res.statusCode).toBe(400);
        expect(res.json().error).toBe('VALIDATION_ERROR');
    });

    it('serves facets for the filter widgets', async () => {
        const res = await app.inject({method: 'GET', url: '/api/cards/facets'});
        expect(res.json()).toEqual({
            ok: true,
            types: ['Fire', 'Lightning'],
            rarities: ['Common', 'Rare'],
            sets: [],
        });
    });

    it('answers 404 for an unknown card', async () => {
        const res = await app.inject({method: 'GET', url: '/api/cards/mew'});
        expect(res.statusCode).toBe(404);
        expect(res.json()).toEqual({ok: false, error: 'NOT_FOUND', msg: 'Card not found: mew'});
    });
});

describe('ownership routes', () => {
    beforeEach(async () => {
        await importSheet();
    });

    it('sets ownership idempotently', async () => {
        for (let i = 0; i < 2; i++) {
            const res = await app.inject({
                method: 'PUT',
                url: '/api/cards/pikachu/ownership',
                payload: {owned: true},
            });
            expect(res.statusCode).toBe(200);
            expect(res.json().card.owned).toBe(true);
        }
        const owned = await app.inject({method: 'GET', url: '/api/cards?owned=true'});
        expect(owned.json().cards.map((c: { id: string }) => c.id)).toEqual(['pikachu']);
    });

    it('toggling twice restores the original state', async () => {
        const first = await app.inject({method: 'POST', url: '/api/cards/charizard/ownership/toggle'});
        expect(first.json().card.owned).toBe(true);
        const second = await app.inject({method: 'POST', url: '/api/cards/charizard/ownership/toggle'});
        expect(second.json().card.owned).toBe(false);
    });

    it('validates the body and the card id', async () => {
        const bad = await app.inject({
            method: 'PUT',
            url: '/api/cards/pikachu/ownership',
            payload: {owned: 'yes'},
        });
        expect(bad.statusCode).toBe(400);

        const missing = await app.inject({
            method: 'PUT',
            url: '/api/cards/mew/ownership',
            payload: {owned: true},
        });
        expect(missing.statusCode).toBe(404);
    });
});

describe('card CRUD', () => {
    it('creates a card with a derived id and refuses a duplicate', async () => {
        const payload = {name: 'Dark Charizard', type: 'Fire', rarity: 'Holo Rare', setName: 'Team Rocket', number: '4'};
        const res = await app.inject({method: 'POST', url: '/api/cards', payload});
        expect(res.statusCode).toBe(201);
        expect(res.json().card).toMatchObject({id: 'dark-charizard:team-rocket:4', owned: false, imageFileName: null});

        const again = await app.inject({method: 'POST', url: '/api/cards', payload});
        expect(again.statusCode).toBe(409);
        expect(again.json().error).toBe('CONFLICT');
    });

    it('patches fields and clears them with an empty string', async () => {
        await importSheet();
        const res = await app.inject({
            method: 'PATCH',
            url: '/api/cards/charizard',
            payload: {rarity: 'Holo Rare', imageFileName: ''},
        });
        expect(res.statusCode).toBe(200);
        expect(res.json().card).toMatchObject({rarity: 'Holo Rare', imageFileName: null, thumbnailUrl: null});

        const unknownField = await app.inject({method: 'PATCH', url: '/api/cards/charizard', payload: {hp: '120'}});
        expect(unknownField.statusCode).toBe(400);
    });
});

describe('GET /api/stats', () => {
    it('reports 0% before anything is owned and 100% once all is owned', async () => {
        await importSheet();
        const before = await app.inject({method: 'GET', url: '/api/stats'});
        expect(before.json().stats).toMatchObject({totalCards: 3, ownedCards: 0, percentage: 0});

        for (const id of ['pikachu', 'charizard', 'raichu']) {
            await app.inject({method: 'PUT', url: `/api/cards/${id}/ownership`, payload: {owned: true}});
        }
        const after = await app.inject({method: 'GET', url: '/api/stats'});
        const stats = after.json().stats;
        expect(stats).toMatchObject({totalCards: 3, ownedCards: 3, missingCards: 0, percentage: 100});
        expect(stats.byType).toEqual([
            {key: 'Lightning', total: 2, owned: 2, missing: 0, percentage: 100},
            {key: 'Fire', total: 1, owned: 1, missing: 0, percentage: 100},
        ]);
    });
});

describe('health and metrics', () => {
    it('reports the database as healthy', async () => {
        const res = await app.inject({method: 'GET', url: '/api/health'});
        expect(res.json()).toEqual({ok: true, healthy: true, services: {database: true}});
    });

    it('counts imported rows and exposes them at /metrics', async () => {
        // the registry is shared by every test in this file
        const createdSoFar = async () =>
            (await cardsImportedCounter.get()).values.find((v) => v.labels.outcome === 'created')?.value ?? 0;

        const before = await createdSoFar();
        await importSheet();
        expect(await createdSoFar()).toBe(before + 3);

        const res = await app.inject({method: 'GET', url: '/metrics'});
        expect(res.statusCode).toBe(200);
        expect(res.body).toContain('# TYPE cards_imported_total counter');
    });
});
