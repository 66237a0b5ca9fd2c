import { UNKNOWN_AUTHOR_NAME, type AuthorRow, type AuthorshipRow } from '../types/index.js';

/**
 * Collapse repeated authors to one row per `author_id`.
 *
 * Attributes merge last-non-null-wins: a later occurrence replaces a value,
 * but a later null leaves the earlier value in place. The placeholder name
 * counts as null. Rows keep the order of first appearance.
 *
 * So an author listed first with an ORCID and again without one keeps the
 * ORCID; a plain last-wins replacement would drop it.
 */
export function dedupeAuthors(rows: readonly AuthorRow[]): AuthorRow[] {
    const byId = new Map<string, AuthorRow>();

    for (const row of rows) {
        const existing = byId.get(row.author_id);
        if (!existing) {
            byId.set(row.author_id, { ...row });
            continue;
        }

        if (row.display_name !== UNKNOWN_AUTHOR_NAME) existing.display_name = row.display_name;
        existing.orcid = row.orcid ?? existing.orcid;
        existing.primary_institution = row.primary_institution ?? existing.primary_institution;
        existing.primary_country = row.primary_country ?? existing.primary_country;
    }

    return [...byId.values()];
}

export interface AuthorshipDedupeResult {
    rows: AuthorshipRow[];
    /** Occurrences discarded because the pair was already seen */
    duplicates: number;
}

/**
 * Keep the first occurrence of each (paper_id, author_id) pair.
 * Later duplicates are dropped whole, unlike authors.
 */
export function dedupeAuthorships(rows: readonly AuthorshipRow[]): AuthorshipDedupeResult {
    const seen = new Set<string>();
    const kept: AuthorshipRow[] = [];
    let duplicates = 0;

    for (const row of rows) {
        const key = `${row.paper_id}\u0000${row.author_id}`;
        if (seen.has(key)) {
            duplicates++;
            continue;
        }
        seen.add(key);
        kept.push(row);
    }

    return { rows: kept, duplicates };
}
