/**
 * csv.ts
 *
 * Low-level CSV reading: byte decoding, delimiter sniffing and row parsing
 * through csv-parser. Knows nothing about cards; `columns.ts` maps the
 * resulting header names.
 */

import {Readable} from "node:stream";
import csv from "csv-parser";

export type CsvTable = {
    headers: string[];
    rows: Record<string, string>[];
};

const SEPARATORS = [",", ";", "\t"] as const;
export type Separator = (typeof SEPARATORS)[number];

/**
 * Decodes uploaded bytes as UTF-8, falling back to latin1 for spreadsheets
 * exported by older Excel versions. A leading BOM is dropped.
 */
export function decodeCsv(input: string | Uint8Array): string {
    let text: string;
    if (typeof input === "string") {
        text = input;
    } else {
        try {
            text = new TextDecoder("utf-8", {fatal: true}).decode(input);
        } catch {
            text = Buffer.from(input).toString("latin1");
        }
    }
    return text.replace(/^\uFEFF/, "");
}

export function sniffSeparator(text: string): Separator {
    const headerLine = text.split(/\r?\n/, 1)[0] ?? "";
    let best: Separator = ",";
    let bestCount = 0;
    for (const sep of SEPARATORS) {
        const n = headerLine.split(sep).length - 1;
        if (n > bestCount) {
            best = sep;
            bestCount = n;
        }
    }
    return best;
}

/**
 * Parses the sheet with the first line as header. `headers` holds the raw
 * header names; each row is keyed by column position (`"0"`, `"1"`, ...) so
 * two headers with the same name do not overwrite each other.
 */
export function parseCsv(text: string): Promise<CsvTable> {
    const separator = sniffSeparator(text);
    return new Promise((resolve, reject) => {
        const headers: string[] = [];
        const rows: Record<string, string>[] = [];
        Readable.from([text])
            .pipe(csv({
                separator,
                mapHeaders: ({header, index}) => {
                    headers[index] = header;
                    return String(index);
                },
                strict: false,
            }))
            .on("data", (row: Record<string, string>) => {
                rows.push(row);
            })
            .on("error", reject)
            .on("end", () => resolve({headers, rows}));
    });
}
