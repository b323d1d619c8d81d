/**
 * errors.ts
 *
 * Typed application errors. Each carries the machine-readable code sent to
 * clients and the HTTP status the routes answer with.
 */

export type ErrorCode =
    | "VALIDATION_ERROR"
    | "CSV_FORMAT_ERROR"
    | "NOT_FOUND"
    | "CONFLICT";

export class AppError extends Error {
    constructor(
        readonly code: ErrorCode,
        readonly statusCode: number,
        message: string,
    ) {
        super(message);
        this.name = "AppError";
    }
}

export class CsvFormatError extends AppError {
    constructor(message: string) {
        super("CSV_FORMAT_ERROR", 400, message);
        this.name = "CsvFormatError";
    }
}

export class NotFoundError extends AppError {
    constructor(what: string, id: string) {
        super("NOT_FOUND", 404, `${what} not found: ${id}`);
        this.name = "NotFoundError";
    }
}

export class ConflictError extends AppError {
    constructor(message: string) {
        super("CONFLICT", 409, message);
        this.name = "ConflictError";
    }
}

export class ValidationError extends AppError {
    constructor(message: string) {
        super("VALIDATION_ERROR", 400, message);
        this.name = "ValidationError";
    }
}
