/**
 * cardId.ts
 *
 * Stable card identifiers. An explicit identifying column wins; otherwise the
 * id is derived from name + set (+ number) so re-importing the same sheet
 * lands on the same rows.
 */

export function slugify(value: string): string {
    return value
        .normalize("NFD")
        .replace(/[\u0300-\u036f]/g, "")
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, "-")
        .replace(/^-+|-+$/g, "");
}

export type CardIdParts = {
    explicitId?: string | null;
    name: string;
    setName?: string | null;
    number?: string | null;
};

export function deriveCardId({explicitId, name, setName, number}: CardIdParts): string {
    const explicit = explicitId?.trim();
    if (explicit) return explicit;

    const parts = [name, setName, number]
        .map((part) => (part ? slugify(part) : ""))
        .filter((part) => part.length > 0);
    return parts.join(":");
}
