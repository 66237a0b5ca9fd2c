import {
    UNKNOWN_AUTHOR_NAME,
    type AuthorPosition,
    type AuthorRow,
    type AuthorshipRow,
    type PaperRow,
} from '../types/index.js';
import { NormalizationError } from '../utils/errors.js';
import {
    asArray,
    asBoolean,
    asNumber,
    asRecord,
    asString,
    asStringArray,
    extractIdFromUrl,
    getPath,
    stripDoiPrefix,
    stripOrcidPrefix,
} from '../sources/utils.js';
import { matchDomainVocabulary } from './relevance.js';
import type { RunContext } from './run-context.js';

export interface NormalizedWork {
    paper: PaperRow;
    /** One row per authorship with an author id, in source order (may repeat) */
    authors: AuthorRow[];
    authorships: AuthorshipRow[];
}

export type NormalizeResult =
    | ({ ok: true } & NormalizedWork)
    | { ok: false; error: NormalizationError };

const AUTHOR_POSITIONS: readonly AuthorPosition[] = ['first', 'middle', 'last'];

/**
 * Flatten one raw OpenAlex work into a paper row plus its author and
 * authorship rows. Never throws: missing or mistyped fields become null,
 * and only a record without an id is rejected.
 */
export function normalizeWork(raw: unknown, ctx: RunContext): NormalizeResult {
    const title = asString(getPath(raw, 'title')) ?? asString(getPath(raw, 'display_name'));
    const paperId = extractIdFromUrl(getPath(raw, 'id'));

    if (!paperId) {
        return {
            ok: false,
            error: new NormalizationError(`Work has no id: ${title ?? '(untitled)'}`, title),
        };
    }

    const location = getPath(raw, 'primary_location');
    const source = getPath(location, 'source');
    const openAccess = getPath(raw, 'open_access');
    const rawAuthorships = asArray(getPath(raw, 'authorships'));

    const concepts = asArray(getPath(raw, 'concepts'))
        .map((concept, index) => ({
            name: asString(getPath(concept, 'display_name')),
            score: asNumber(getPath(concept, 'score')) ?? 0,
            index,
        }))
        .sort((a, b) => b.score - a.score || a.index - b.index);

    const keywordNames = asArray(getPath(raw, 'keywords'))
        .map((keyword) => (typeof keyword === 'string' ? asString(keyword) : asString(getPath(keyword, 'display_name'))))
        .filter((name): name is string => name !== null);

    const conceptNames = concepts
        .map((concept) => concept.name)
        .filter((name): name is string => name !== null);

    const relevance = matchDomainVocabulary(title, conceptNames, keywordNames);
    const affiliations = summarizeAffiliations(rawAuthorships);

    const firstAuthor = rawAuthorships.find((a) => getPath(a, 'author_position') === 'first');
    const correspondingAuthor = rawAuthorships.find((a) => getPath(a, 'is_corresponding') === true);

    const percentile = asNumber(getPath(raw, 'citation_normalized_percentile', 'value'));

    const paper: PaperRow = {
        paper_id: paperId,
        doi: ctx.claimDoi(stripDoiPrefix(getPath(raw, 'doi')), paperId),
        title,
        publication_year: asNumber(getPath(raw, 'publication_year')),
        publication_date: asString(getPath(raw, 'publication_date')),
        paper_type: asString(getPath(raw, 'type')),
        language: asString(getPath(raw, 'language')),

        journal_name: asString(getPath(source, 'display_name')),
        publisher: asString(getPath(source, 'host_organization_name')),
        journal_issn: asString(getPath(source, 'issn_l')),
        is_core_journal: asBoolean(getPath(source, 'is_core')),

        is_open_access: asBoolean(getPath(openAccess, 'is_oa')),
        oa_status: asString(getPath(openAccess, 'oa_status')),
        pdf_url: asString(getPath(location, 'pdf_url')) ?? asString(getPath(openAccess, 'oa_url')),
        landing_page_url: asString(getPath(location, 'landing_page_url')),
        license: asString(getPath(location, 'license')),

        author_count: rawAuthorships.length,
        first_author_name: asString(getPath(firstAuthor, 'author', 'display_name')),
        corresponding_author_name: asString(getPath(correspondingAuthor, 'author', 'display_name')),
        institution_count: affiliations.institutions.size,
        country_count: affiliations.countries.size,
        first_institution: affiliations.firstInstitution,
        first_country: affiliations.firstCountry,

        cited_by_count: asNumber(getPath(raw, 'cited_by_count')) ?? 0,
        referenced_works_count: asNumber(getPath(raw, 'referenced_works_count')) ?? 0,
        fwci: asNumber(getPath(raw, 'fwci')),
        citation_percentile: percentile === null ? null : percentile * 100,

        primary_topic: asString(getPath(asArray(getPath(raw, 'topics'))[0], 'display_name')),
        top_concept_1: concepts[0]?.name ?? null,
        top_concept_2: concepts[1]?.name ?? null,
        top_concept_3: concepts[2]?.name ?? null,
        keywords: keywordNames.length > 0 ? keywordNames : null,

        is_retracted: asBoolean(getPath(raw, 'is_retracted')) ?? false,
        is_paratext: asBoolean(getPath(raw, 'is_paratext')) ?? false,
        has_abstract: hasAbstract(getPath(raw, 'abstract_inverted_index')),

        domain_relevance_score: relevance.score,
        is_domain_relevant: relevance.isDomainRelevant,
        fetch_relevance_score: asNumber(getPath(raw, '_relevance_score')),

        created_date: asString(getPath(raw, 'created_date')),
        updated_date: asString(getPath(raw, 'updated_date')),
    };

    const authors: AuthorRow[] = [];
    const authorships: AuthorshipRow[] = [];

    rawAuthorships.forEach((authorship, index) => {
        const author = toAuthorRow(authorship);
        if (author) authors.push(author);

        const link = toAuthorshipRow(paperId, authorship, index + 1);
        if (link) authorships.push(link);
    });

    return { ok: true, paper, authors, authorships };
}

/**
 * Author row from one authorship sub-record, or null without an author id.
 */
export function toAuthorRow(authorship: unknown): AuthorRow | null {
    const authorId = extractIdFromUrl(getPath(authorship, 'author', 'id'));
    if (!authorId) return null;

    return {
        author_id: authorId,
        display_name: asString(getPath(authorship, 'author', 'display_name')) ?? UNKNOWN_AUTHOR_NAME,
        orcid: stripOrcidPrefix(getPath(authorship, 'author', 'orcid')),
        primary_institution: asString(getPath(asArray(getPath(authorship, 'institutions'))[0], 'display_name')),
        primary_country: asStringArray(getPath(authorship, 'countries'))[0] ?? null,
    };
}

/**
 * Paper/author link from one authorship sub-record, or null without an author id.
 * `sequence` is the 1-based position in the source list.
 */
export function toAuthorshipRow(paperId: string, authorship: unknown, sequence: number): AuthorshipRow | null {
    const authorId = extractIdFromUrl(getPath(authorship, 'author', 'id'));
    if (!authorId) return null;

    const institutions = asArray(getPath(authorship, 'institutions'));
    const institutionNames = institutions
        .map((inst) => asString(getPath(inst, 'display_name')))
        .filter((name): name is string => name !== null);
    const institutionIds = institutions
        .map((inst) => extractIdFromUrl(getPath(inst, 'id')))
        .filter((id): id is string => id !== null);
    const countries = asStringArray(getPath(authorship, 'countries'));
    const rawAffiliations = asStringArray(getPath(authorship, 'raw_affiliation_strings'));

    return {
        paper_id: paperId,
        author_id: authorId,
        author_position: parsePosition(getPath(authorship, 'author_position')),
        author_sequence: sequence,
        is_corresponding: asBoolean(getPath(authorship, 'is_corresponding')) ?? false,
        institution_names: nonEmpty(institutionNames),
        institution_ids: nonEmpty(institutionIds),
        countries: nonEmpty(countries),
        raw_affiliation_strings: nonEmpty(rawAffiliations),
    };
}

interface AffiliationSummary {
    institutions: Set<string>;
    countries: Set<string>;
    firstInstitution: string | null;
    firstCountry: string | null;
}

function summarizeAffiliations(authorships: unknown[]): AffiliationSummary {
    const summary: AffiliationSummary = {
        institutions: new Set(),
        countries: new Set(),
        firstInstitution: null,
        firstCountry: null,
    };

    for (const authorship of authorships) {
        for (const inst of asArray(getPath(authorship, 'institutions'))) {
            const name = asString(getPath(inst, 'display_name'));
            if (!name) continue;
            summary.institutions.add(name);
            summary.firstInstitution ??= name;
        }
        for (const country of asStringArray(getPath(authorship, 'countries'))) {
            summary.countries.add(country);
            summary.firstCountry ??= country;
        }
    }

    return summary;
}

function parsePosition(value: unknown): AuthorPosition | null {
    return AUTHOR_POSITIONS.find((position) => position === value) ?? null;
}

function hasAbstract(index: unknown): boolean {
    const record = asRecord(index);
    return record !== null && Object.keys(record).length > 0;
}

function nonEmpty(values: string[]): string[] | null {
    return values.length > 0 ? values : null;
}
