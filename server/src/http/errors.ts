/**
 * errors.ts
 *
 * Maps thrown errors onto the `{ok: false, error}` response shape shared by
 * every route: zod issues become 400s, `AppError`s use their own status and
 * anything else is logged and reported as an internal error.
 */

import type {FastifyBaseLogger, FastifyReply} from "fastify";
import {ZodError} from "zod";
import {AppError} from "../errors.js";

export function sendError(log: FastifyBaseLogger, reply: FastifyReply, err: unknown, action: string) {
    if (err instanceof ZodError) {
        log.warn({issues: err.issues}, `${action}: validation error`);
        return reply.code(400).send({
            ok: false,
            error: "VALIDATION_ERROR",
            issues: err.issues,
        });
    }
    if (err instanceof AppError) {
        log.warn({code: err.code, msg: err.message}, `${action} failed`);
        return reply.code(err.statusCode).send({
            ok: false,
            error: err.code,
            msg: err.message,
        });
    }
    log.error({err}, `${action} failed`);
    return reply.code(500).send({ok: false, error: "INTERNAL_ERROR"});
}
