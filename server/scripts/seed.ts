/**
 * seed.ts
 *
 * Imports a CSV file into the catalog database from the command line. Uses
 * the same importer as the HTTP endpoint, so row errors are reported the
 * same way.
 *
 * Usage: `npm run seed -- cards.csv` (DATABASE_PATH selects the database)
 */

import fs from "node:fs";
import {loadConfig} from "../src/config.js";
import {CatalogStore} from "../src/catalog/store.js";
import {openDatabase} from "../src/db/sqlite.js";
import {importCards} from "../src/importer/importer.js";
import {debug, error, info, setDebugLogging, warn} from "../src/logging.js";

async function main() {
    const file = process.argv[2];
    if (!file) {
        error("usage: seed <file.csv>");
        process.exitCode = 1;
        return;
    }

    const config = loadConfig();
    setDebugLogging(config.logDebug);
    debug("seed config", config);
    const handle = openDatabase(config.databasePath);
    try {
        const bytes = fs.readFileSync(file);
        const store = new CatalogStore(handle.db);
        const result = await importCards(bytes, store, {maxRows: config.importMaxRows});

        info(`>>> SEED ${file} -> ${config.databasePath}`);
        info(`created ${result.created}, updated ${result.updated}, skipped ${result.skipped}, duplicates ${result.duplicates}`);
        for (const rowError of result.errors) {
            warn(`row ${rowError.row}: ${rowError.reason}`);
        }
        info(`catalog now holds ${store.count()} cards`);
    } finally {
        handle.close();
    }
}

main().catch((e) => {
    error(e);
    process.exitCode = 1;
});
