/**
 * OpenAlex work response types (subset of relevant fields).
 *
 * This documents the shape we expect, not a guarantee: any field may be
 * missing, null or of the wrong type. The normalizer reads raw input as
 * `unknown` through the safe lookup helpers in `sources/utils.ts`.
 *
 * @see https://docs.openalex.org/api-entities/works/work-object
 */
export interface OpenAlexWork {
    id: string;
    doi?: string | null;
    title?: string | null;
    display_name?: string | null;
    publication_year?: number | null;
    publication_date?: string | null;
    type?: string | null;
    language?: string | null;
    primary_location?: {
        source?: {
            display_name?: string | null;
            host_organization_name?: string | null;
            issn_l?: string | null;
            is_core?: boolean | null;
        } | null;
        pdf_url?: string | null;
        landing_page_url?: string | null;
        license?: string | null;
    } | null;
    open_access?: {
        is_oa?: boolean | null;
        oa_status?: string | null;
        oa_url?: string | null;
    } | null;
    authorships?: OpenAlexAuthorship[] | null;
    cited_by_count?: number | null;
    referenced_works_count?: number | null;
    fwci?: number | null;
    citation_normalized_percentile?: { value?: number | null } | null;
    primary_topic?: OpenAlexTopic | null;
    topics?: OpenAlexTopic[] | null;
    concepts?: Array<{ id?: string; display_name?: string | null; score?: number | null; level?: number | null }> | null;
    keywords?: Array<{ id?: string; display_name?: string | null; score?: number | null } | string> | null;
    is_retracted?: boolean | null;
    is_paratext?: boolean | null;
    abstract_inverted_index?: Record<string, number[]> | null;
    created_date?: string | null;
    updated_date?: string | null;

    /** Annotations added by the fetch-time relevance filter */
    _relevance_score?: number;
    _has_domain_field?: boolean;
}

export interface OpenAlexAuthorship {
    author_position?: string | null;
    author?: {
        id?: string | null;
        display_name?: string | null;
        orcid?: string | null;
    } | null;
    institutions?: Array<{
        id?: string | null;
        display_name?: string | null;
        country_code?: string | null;
    }> | null;
    countries?: string[] | null;
    is_corresponding?: boolean | null;
    raw_affiliation_strings?: string[] | null;
}

export interface OpenAlexTopic {
    id?: string;
    display_name?: string | null;
    score?: number | null;
    field?: { display_name?: string | null } | null;
    subfield?: { display_name?: string | null } | null;
}

export interface OpenAlexListResponse<T> {
    meta: { count: number; per_page: number; next_cursor?: string | null };
    results: T[];
}

export interface OpenAlexConcept {
    id: string;
    display_name?: string;
    cited_by_count?: number;
}
