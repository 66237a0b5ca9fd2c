/**
 * Shared helpers for reading raw source records.
 *
 * Raw works arrive as untyped JSON. Every lookup below degrades to `null`
 * (or an empty array) instead of throwing when a level is missing or of
 * the wrong type.
 */

export type RawRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is RawRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asRecord(value: unknown): RawRecord | null {
    return isRecord(value) ? value : null;
}

/**
 * Walk `path` through nested objects.
 * getPath(work, 'primary_location', 'source', 'display_name')
 */
export function getPath(value: unknown, ...path: string[]): unknown {
    let current: unknown = value;
    for (const key of path) {
        const record = asRecord(current);
        if (!record) return null;
        current = record[key];
    }
    return current ?? null;
}

/** Non-empty string, else null. */
export function asString(value: unknown): string | null {
    if (typeof value !== 'string') return null;
    return value.trim() === '' ? null : value;
}

export function asNumber(value: unknown): number | null {
    return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function asBoolean(value: unknown): boolean | null {
    return typeof value === 'boolean' ? value : null;
}

export function asArray(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

/** Non-empty strings of an array, in order. */
export function asStringArray(value: unknown): string[] {
    const out: string[] = [];
    for (const item of asArray(value)) {
        const str = asString(item);
        if (str !== null) out.push(str);
    }
    return out;
}

/**
 * Trailing path segment of an OpenAlex URI.
 * "https://openalex.org/W2741809807" → "W2741809807"
 */
export function extractIdFromUrl(url: unknown): string | null {
    const str = asString(url);
    if (!str) return null;
    const segment = str.replace(/\/+$/, '').split('/').pop();
    return segment ? segment.trim() || null : null;
}

/**
 * Strip DOI prefix URLs to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: unknown): string | null {
    const str = asString(doi);
    if (!str) return null;
    return str
        .replace('https://doi.org/', '')
        .replace('http://doi.org/', '')
        .trim() || null;
}

/**
 * "https://orcid.org/0000-0002-1825-0097" → "0000-0002-1825-0097"
 */
export function stripOrcidPrefix(orcid: unknown): string | null {
    const str = asString(orcid);
    if (!str) return null;
    return str
        .replace('https://orcid.org/', '')
        .replace('http://orcid.org/', '')
        .trim() || null;
}
