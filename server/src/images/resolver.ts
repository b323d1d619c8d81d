/**
 * resolver.ts
 *
 * Locates card images on disk. Directories are searched in order: the
 * configured one, then `./images`, then `./data/images`; only those that exist
 * when the resolver is built take part. A file that cannot be found simply
 * has no thumbnail.
 */

import fs from "node:fs";
import path from "node:path";
import type {CardRecord} from "../../../shared/types/card.js";

const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".webp"];

export const IMAGES_URL_PREFIX = "/images/";

/**
 * File names a scan of set `setName`, card `number` is commonly saved
 * under: `<set>_<n>`, `<set><n>` and `<n>`, with the number as written,
 * digits only, zero-padded to 3 and 4, and alphanumerics only.
 */
export function imageNameCandidates(setName: string, number: string): string[] {
    const set = setName.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "_").replace(/^_+|_+$/g, "");
    const raw = number.trim().toLowerCase().replace(/[#\s]/g, "");
    const digits = raw.replace(/\D/g, "");
    const alnum = raw.replace(/[^\p{L}\p{N}]/gu, "");

    const bases = new Set([raw]);
    if (digits) {
        bases.add(digits);
        bases.add(digits.padStart(3, "0"));
        bases.add(digits.padStart(4, "0"));
    }
    if (alnum) bases.add(alnum);

    const names = new Set<string>();
    for (const base of bases) {
        if (!base) continue;
        if (set) {
            names.add(`${set}_${base}`);
            names.add(`${set}${base}`);
        }
        names.add(base);
    }
    return [...names];
}

function isDirectory(p: string): boolean {
    try {
        return fs.statSync(p).isDirectory();
    } catch {
        return false;
    }
}

function isFile(p: string): boolean {
    try {
        return fs.statSync(p).isFile();
    } catch {
        return false;
    }
}

export class ImageResolver {
    readonly directories: string[];

    constructor(configuredDir: string | null, cwd: string = process.cwd()) {
        const candidates = [
            configuredDir ? path.resolve(cwd, configuredDir) : null,
            path.join(cwd, "images"),
            path.join(cwd, "data", "images"),
        ];
        this.directories = [...new Set(candidates)]
            .filter((dir): dir is string => dir !== null && isDirectory(dir));
    }

    /**
     * Returns the image path relative to the directory it was found in, using
     * forward slashes, or null when no directory holds it.
     */
    resolve(fileName: string | null | undefined): string | null {
        const cleaned = (fileName ?? "").trim().replace(/\\/g, "/");
        if (!cleaned || path.posix.isAbsolute(cleaned) || cleaned.split("/").includes("..")) {
            return null;
        }

        const hasImageExtension = IMAGE_EXTENSIONS.includes(path.posix.extname(cleaned).toLowerCase());
        const names = hasImageExtension
            ? [cleaned]
            : [cleaned, ...IMAGE_EXTENSIONS.map((ext) => `${cleaned}${ext}`)];

        for (const dir of this.directories) {
            for (const name of names) {
                if (isFile(path.join(dir, name))) return name;
            }
        }
        return null;
    }

    /**
     * Looks for an image named after the card's set and number. Used when the
     * sheet gave no image file name.
     */
    guess(setName: string | null | undefined, number: string | null | undefined): string | null {
        if (!setName?.trim() || !number?.trim()) return null;
        for (const candidate of imageNameCandidates(setName, number)) {
            const found = this.resolve(candidate);
            if (found) return found;
        }
        return null;
    }

    thumbnailUrl(fileName: string | null | undefined): string | null {
        const resolved = this.resolve(fileName);
        return resolved ? toImageUrl(resolved) : null;
    }

    /** Thumbnail of a card: its own image file, or a guess from set and number when it has none. */
    thumbnailFor(card: Pick<CardRecord, "imageFileName" | "setName" | "number">): string | null {
        if (card.imageFileName) return this.thumbnailUrl(card.imageFileName);
        const guessed = this.guess(card.setName, card.number);
        return guessed ? toImageUrl(guessed) : null;
    }
}

function toImageUrl(relative: string): string {
    return `${IMAGES_URL_PREFIX}${relative.split("/").map(encodeURIComponent).join("/")}`;
}
