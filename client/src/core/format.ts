/**
 * format.ts
 *
 * Pure display helpers shared by the screens. Everything rendered from
 * imported spreadsheet data goes through `escapeHtml` before it lands in a
 * template string.
 */

import type {ImportResult, RowError} from "../../../shared/types/collection.js";

const HTML_ESCAPES: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
    "'": "&#39;",
};

export function escapeHtml(value: string | null | undefined): string {
    return (value ?? "").replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** `42.5` -> `"42.5%"`; the server already rounds to one decimal. */
export function formatPercent(value: number): string {
    return `${value.toFixed(1)}%`;
}

export function pageCount(total: number, pageSize: number): number {
    return Math.max(1, Math.ceil(total / pageSize));
}

export function rowErrorText(err: RowError): string {
    return `Row ${err.row}: ${err.reason}`;
}

export function summarizeImport(result: ImportResult): string {
    const parts = [
        `${result.created} created`,
        `${result.updated} updated`,
        `${result.skipped} skipped`,
    ];
    if (result.duplicates > 0) parts.push(`${result.duplicates} duplicates merged`);
    return parts.join(", ");
}

/**
 * Text of an uploaded sheet for display only; the upload itself sends the
 * bytes. Invalid UTF-8 is read as Windows-1252.
 */
export function decodeSheet(bytes: ArrayBuffer): string {
    try {
        return new TextDecoder("utf-8", {fatal: true}).decode(bytes);
    } catch {
        return new TextDecoder("windows-1252").decode(bytes);
    }
}

/**
 * First lines of a sheet for the import preview, split on the same
 * delimiters the server sniffs. Quoted delimiters are not honoured here.
 */
export function previewRows(csv: string, maxLines = 6): string[][] {
    const lines = csv.replace(/^\uFEFF/, "").split(/\r?\n/).filter((line) => line.trim() !== "");
    const header = lines[0] ?? "";
    const separator = [";", "\t"].find((sep) => header.split(sep).length > header.split(",").length) ?? ",";
    return lines.slice(0, maxLines).map((line) => line.split(separator).map((cell) => cell.trim()));
}
