import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { OpenAlexWork, PaperRow, WorkSource } from '../types/index.js';

/**
 * A raw work that passes every quality check once loaded.
 */
export function makeWork(id: string, overrides: Partial<OpenAlexWork> = {}): OpenAlexWork {
    return {
        id: `https://openalex.org/${id}`,
        doi: `https://doi.org/10.1000/${id.toLowerCase()}`,
        title: `Study ${id}`,
        publication_year: 2024,
        publication_date: '2024-01-15',
        type: 'article',
        language: 'en',
        primary_location: {
            source: { display_name: 'Journal of Tests', host_organization_name: 'Test Press', issn_l: '1234-5678', is_core: true },
            pdf_url: null,
            landing_page_url: `https://example.org/${id}`,
            license: 'cc-by',
        },
        open_access: { is_oa: true, oa_status: 'gold', oa_url: `https://example.org/${id}.pdf` },
        authorships: [
            {
                author_position: 'first',
                author: { id: `https://openalex.org/A${id}1`, display_name: 'Ada Example', orcid: null },
                institutions: [{ id: 'https://openalex.org/I1', display_name: 'Example University', country_code: 'GB' }],
                countries: ['GB'],
                is_corresponding: true,
                raw_affiliation_strings: ['Example University, UK'],
            },
            {
                author_position: 'last',
                author: { id: `https://openalex.org/A${id}2`, display_name: 'Bo Sample', orcid: null },
                institutions: [],
                countries: [],
                is_corresponding: false,
                raw_affiliation_strings: [],
            },
        ],
        cited_by_count: 3,
        referenced_works_count: 12,
        is_retracted: false,
        is_paratext: false,
        created_date: '2024-01-10',
        updated_date: '2024-01-20T10:00:00',
        ...overrides,
    };
}

/**
 * A normalized paper row with only the id and title set.
 */
export function makePaperRow(paperId: string, overrides: Partial<PaperRow> = {}): PaperRow {
    return {
        paper_id: paperId,
        doi: null,
        title: `Paper ${paperId}`,
        publication_year: null,
        publication_date: null,
        paper_type: null,
        language: null,
        journal_name: null,
        publisher: null,
        journal_issn: null,
        is_core_journal: null,
        is_open_access: null,
        oa_status: null,
        pdf_url: null,
        landing_page_url: null,
        license: null,
        author_count: 0,
        first_author_name: null,
        corresponding_author_name: null,
        institution_count: 0,
        country_count: 0,
        first_institution: null,
        first_country: null,
        cited_by_count: 0,
        referenced_works_count: 0,
        fwci: null,
        citation_percentile: null,
        primary_topic: null,
        top_concept_1: null,
        top_concept_2: null,
        top_concept_3: null,
        keywords: null,
        is_retracted: false,
        is_paratext: false,
        has_abstract: false,
        domain_relevance_score: 0,
        is_domain_relevant: false,
        fetch_relevance_score: null,
        created_date: null,
        updated_date: null,
        ...overrides,
    };
}

export function staticSource(works: unknown[]): WorkSource {
    return {
        name: 'static',
        fetchWorks: async () => works,
    };
}

export function tempDir(prefix = 'biblio-etl-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}
