/**
 * helpers.ts
 *
 * Shared fixtures for the server suites: an in-memory catalog database and a
 * throw-away working directory for image lookups.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {CatalogStore} from '../src/catalog/store.js';
import {openDatabase, type DatabaseHandle} from '../src/db/sqlite.js';
import type {AppContext} from '../src/http/context.js';
import {ImageResolver} from '../src/images/resolver.js';
import type {CardRecord} from '../../shared/types/card.js';

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'card-collection-'));
}

export function writeImage(dir: string, name: string) {
    fs.mkdirSync(dir, {recursive: true});
    fs.writeFileSync(path.join(dir, name), '');
}

export type TestContext = AppContext & { handle: DatabaseHandle; cwd: string };

export function createTestContext(opts: { imagesDir?: string; cwd?: string; maxRows?: number } = {}): TestContext {
    const handle = openDatabase(':memory:');
    const cwd = opts.cwd ?? makeTempDir();
    return {
        handle,
        cwd,
        catalog: new CatalogStore(handle.db),
        images: new ImageResolver(opts.imagesDir ?? null, cwd),
        importOptions: {maxRows: opts.maxRows ?? 10_000},
        database: handle,
    };
}

export function card(overrides: Partial<CardRecord> & Pick<CardRecord, 'id' | 'name'>): CardRecord {
    return {
        type: 'Colorless',
        rarity: 'Common',
        imageFileName: null,
        setName: null,
        number: null,
        ...overrides,
    };
}
