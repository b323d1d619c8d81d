/**
 * metrics.ts
 *
 * Prometheus metrics registry and the catalog metrics exposed at `/metrics`.
 * - `register` is the central `prom-client` Registry.
 * - Default process metrics are collected automatically.
 */

import client from 'prom-client';

export const register = new client.Registry();
client.collectDefaultMetrics({register});

// Counter: imported card rows by outcome (created / updated)
export const cardsImportedCounter = new client.Counter({
    name: 'cards_imported_total',
    help: 'Total number of card rows written by CSV imports',
    labelNames: ['outcome'] as const,
    registers: [register],
});

// Counter: CSV rows rejected by validation
export const importRowsRejectedCounter = new client.Counter({
    name: 'import_rows_rejected_total',
    help: 'Total number of CSV rows rejected during import',
    registers: [register],
});

// Counter: ownership marks that actually changed
export const ownershipChangesCounter = new client.Counter({
    name: 'ownership_changes_total',
    help: 'Total number of ownership changes',
    labelNames: ['owned'] as const,
    registers: [register],
});

// Gauge: cards currently in the catalog
export const catalogCardsGauge = new client.Gauge({
    name: 'catalog_cards',
    help: 'Number of cards in the catalog',
    registers: [register],
});
