/**
 * config.ts
 *
 * Reads the environment once at start-up and validates it with zod. Every
 * other module receives the parsed `AppConfig` instead of touching
 * `process.env`, which keeps tests free to build their own configuration.
 */

import {z} from "zod";

const booleanFlag = z
    .enum(["true", "false", "1", "0"])
    .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    HOST: z.string().min(1).default("0.0.0.0"),
    FRONTEND_ORIGIN: z.string().url().default("http://localhost:5173"),
    DATABASE_PATH: z.string().min(1).default("./data/collection.db"),
    CARD_IMAGES_DIR: z.string().trim().min(1).optional(),
    FASTIFY_LOG_LEVEL: z
        .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
        .default("warn"),
    LOG_DEBUG: booleanFlag.default("false"),
    IMPORT_MAX_ROWS: z.coerce.number().int().positive().default(10_000),
    OTEL_ENABLED: booleanFlag.default("false"),
});

export type AppConfig = {
    port: number;
    host: string;
    frontendOrigin: string;
    databasePath: string;
    imagesDir: string | null;
    logLevel: z.infer<typeof envSchema>["FASTIFY_LOG_LEVEL"];
    logDebug: boolean;
    importMaxRows: number;
    otelEnabled: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.parse(env);
    return {
        port: parsed.PORT,
        host: parsed.HOST,
        frontendOrigin: parsed.FRONTEND_ORIGIN,
        databasePath: parsed.DATABASE_PATH,
        imagesDir: parsed.CARD_IMAGES_DIR ?? null,
        logLevel: parsed.FASTIFY_LOG_LEVEL,
        logDebug: parsed.LOG_DEBUG,
        importMaxRows: parsed.IMPORT_MAX_ROWS,
        otelEnabled: parsed.OTEL_ENABLED,
    };
}
