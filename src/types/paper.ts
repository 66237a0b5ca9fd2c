/**
 * One flat record per OpenAlex work, as stored in the `papers` table.
 * Produced by the normalizer from a raw, nested work record.
 */
export interface PaperRow {
    /** Trailing segment of the OpenAlex work URI (e.g., "W2741809807") */
    paper_id: string;

    /** Digital Object Identifier (without https://doi.org/ prefix) */
    doi: string | null;

    /** Paper title (NOT NULL in the store; a null here fails the write) */
    title: string | null;

    publication_year: number | null;

    /** ISO date (YYYY-MM-DD) */
    publication_date: string | null;

    paper_type: string | null;
    language: string | null;

    // Venue, from primary_location.source
    journal_name: string | null;
    publisher: string | null;
    journal_issn: string | null;
    is_core_journal: boolean | null;

    // Open access
    is_open_access: boolean | null;
    oa_status: string | null;
    pdf_url: string | null;
    landing_page_url: string | null;
    license: string | null;

    // Aggregates over the authorship list
    author_count: number;
    first_author_name: string | null;
    corresponding_author_name: string | null;
    institution_count: number;
    country_count: number;
    first_institution: string | null;
    first_country: string | null;

    // Citation metrics
    cited_by_count: number;
    referenced_works_count: number;
    fwci: number | null;
    citation_percentile: number | null;

    // Topics and keywords
    primary_topic: string | null;
    top_concept_1: string | null;
    top_concept_2: string | null;
    top_concept_3: string | null;
    keywords: string[] | null;

    // Status flags
    is_retracted: boolean;
    is_paratext: boolean;
    has_abstract: boolean;

    /** Coarse vocabulary score: 0.5 when `is_domain_relevant`, else 0 */
    domain_relevance_score: number;
    is_domain_relevant: boolean;

    /** Continuous score assigned by the fetch-time scorer, when the record went through it */
    fetch_relevance_score: number | null;

    created_date: string | null;
    updated_date: string | null;
}

/**
 * Author row, keyed by the OpenAlex author id.
 */
export interface AuthorRow {
    author_id: string;
    display_name: string;
    /** Bare ORCID (without https://orcid.org/ prefix) */
    orcid: string | null;
    primary_institution: string | null;
    primary_country: string | null;
}

/**
 * Junction row linking one paper to one author, with positional metadata
 * and the affiliations reported on that paper.
 */
export interface AuthorshipRow {
    paper_id: string;
    author_id: string;
    author_position: AuthorPosition | null;
    /** 1-based order of appearance in the source authorship list */
    author_sequence: number;
    is_corresponding: boolean;
    institution_names: string[] | null;
    institution_ids: string[] | null;
    countries: string[] | null;
    raw_affiliation_strings: string[] | null;
}

export type AuthorPosition = 'first' | 'middle' | 'last';

/**
 * Placeholder stored when a source author carries no display name.
 * Never overwrites a known name on update.
 */
export const UNKNOWN_AUTHOR_NAME = 'Unknown Author';
