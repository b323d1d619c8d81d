/**
 * context.ts
 *
 * Services the HTTP routes work with. Built once in `app.ts`; tests build
 * their own around an in-memory database.
 */

import type {CatalogStore} from "../catalog/store.js";
import type {ImageResolver} from "../images/resolver.js";
import type {ImportOptions} from "../importer/importer.js";

export type AppContext = {
    catalog: CatalogStore;
    images: ImageResolver;
    importOptions: ImportOptions;
    database: { ping(): boolean };
};
