/**
 * app.ts
 *
 * Builds the Fastify application: CORS for the dashboard dev server, static
 * serving of the client build and the card images, and the HTTP routes.
 * Kept apart from `index.ts` so the wiring can be exercised without binding
 * a port.
 */

import fs from "node:fs";
import path from "node:path";
import Fastify, {type FastifyInstance} from "fastify";
import cors from "@fastify/cors";
import fastifyStatic from "@fastify/static";
import type {AppConfig} from "./config.js";
import {CatalogStore} from "./catalog/store.js";
import type {DatabaseHandle} from "./db/sqlite.js";
import type {AppContext} from "./http/context.js";
import {registerHttpRoutes} from "./http/routes.js";
import {ImageResolver, IMAGES_URL_PREFIX} from "./images/resolver.js";
import {catalogCardsGauge} from "./observability/metrics.js";

export function createContext(config: AppConfig, handle: DatabaseHandle, cwd = process.cwd()): AppContext {
    return {
        catalog: new CatalogStore(handle.db),
        images: new ImageResolver(config.imagesDir, cwd),
        importOptions: {maxRows: config.importMaxRows},
        database: handle,
    };
}

export async function buildServer(
    config: AppConfig,
    ctx: AppContext,
    app: FastifyInstance = Fastify({logger: {level: config.logLevel}}),
): Promise<FastifyInstance> {
    await app.register(cors, {
        origin: config.frontendOrigin,
        methods: ["GET", "POST", "PUT", "PATCH", "OPTIONS"],
        allowedHeaders: ["content-type"],
        maxAge: 86400,
    });

    // Client build; absent during API-only development
    const publicRoot = path.join(process.cwd(), "public");
    if (fs.existsSync(publicRoot)) {
        await app.register(fastifyStatic, {
            root: publicRoot,
            prefix: "/",
            maxAge: "1y",
            immutable: true,
        });
    }

    if (ctx.images.directories.length > 0) {
        await app.register(fastifyStatic, {
            root: ctx.images.directories,
            prefix: IMAGES_URL_PREFIX,
            decorateReply: false,
            maxAge: "1h",
        });
        app.log.info({directories: ctx.images.directories}, "serving card images");
    } else {
        app.log.warn("no image directory found; cards will render without thumbnails");
    }

    await registerHttpRoutes(app, ctx);
    catalogCardsGauge.set(ctx.catalog.count());
    return app;
}
