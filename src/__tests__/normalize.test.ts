import { describe, it, expect, beforeEach } from 'vitest';
import { normalizeWork, toAuthorRow, toAuthorshipRow, type NormalizedWork } from '../etl/normalize.js';
import { RunContext } from '../etl/run-context.js';
import { NormalizationError } from '../utils/errors.js';
import { UNKNOWN_AUTHOR_NAME } from '../types/index.js';
import { makeWork } from './helpers.js';

function normalizeOk(raw: unknown, ctx: RunContext): NormalizedWork {
    const result = normalizeWork(raw, ctx);
    if (!result.ok) throw result.error;
    return result;
}

describe('normalizeWork', () => {
    let ctx: RunContext;

    beforeEach(() => {
        ctx = new RunContext();
    });

    describe('paper fields', () => {
        it('should flatten a complete work', () => {
            const { paper } = normalizeOk(makeWork('W1'), ctx);

            expect(paper.paper_id).toBe('W1');
            expect(paper.doi).toBe('10.1000/w1');
            expect(paper.title).toBe('Study W1');
            expect(paper.publication_year).toBe(2024);
            expect(paper.publication_date).toBe('2024-01-15');
            expect(paper.paper_type).toBe('article');
            expect(paper.journal_name).toBe('Journal of Tests');
            expect(paper.publisher).toBe('Test Press');
            expect(paper.journal_issn).toBe('1234-5678');
            expect(paper.is_core_journal).toBe(true);
            expect(paper.is_open_access).toBe(true);
            expect(paper.oa_status).toBe('gold');
            expect(paper.license).toBe('cc-by');
            expect(paper.cited_by_count).toBe(3);
            expect(paper.referenced_works_count).toBe(12);
        });

        it('should aggregate the authorship list', () => {
            const { paper } = normalizeOk(makeWork('W1'), ctx);

            expect(paper.author_count).toBe(2);
            expect(paper.first_author_name).toBe('Ada Example');
            expect(paper.corresponding_author_name).toBe('Ada Example');
            expect(paper.institution_count).toBe(1);
            expect(paper.country_count).toBe(1);
            expect(paper.first_institution).toBe('Example University');
            expect(paper.first_country).toBe('GB');
        });

        it('should fall back to display_name for the title', () => {
            const { paper } = normalizeOk(makeWork('W1', { title: null, display_name: 'Shown Title' }), ctx);
            expect(paper.title).toBe('Shown Title');
        });

        it('should leave the title null when both are missing', () => {
            const { paper } = normalizeOk(makeWork('W1', { title: null }), ctx);
            expect(paper.title).toBeNull();
        });

        it('should fall back to the open access URL for the PDF', () => {
            const { paper } = normalizeOk(makeWork('W1'), ctx);
            expect(paper.pdf_url).toBe('https://example.org/W1.pdf');
        });

        it('should pick the top three concepts by score', () => {
            const { paper } = normalizeOk(
                makeWork('W1', {
                    concepts: [
                        { display_name: 'Low', score: 0.1 },
                        { display_name: 'High', score: 0.9 },
                        { display_name: 'Unscored' },
                        { display_name: 'Mid', score: 0.5 },
                    ],
                }),
                ctx
            );

            expect([paper.top_concept_1, paper.top_concept_2, paper.top_concept_3]).toEqual(['High', 'Mid', 'Low']);
        });

        it('should read keyword names from objects and strings', () => {
            const { paper } = normalizeOk(makeWork('W1', { keywords: [{ display_name: 'Graphs' }, 'Trees', { score: 1 }] }), ctx);
            expect(paper.keywords).toEqual(['Graphs', 'Trees']);
        });

        it('should store null keywords when there are none', () => {
            const { paper } = normalizeOk(makeWork('W1', { keywords: [] }), ctx);
            expect(paper.keywords).toBeNull();
        });

        it('should take the primary topic from the first topic', () => {
            const { paper } = normalizeOk(
                makeWork('W1', { topics: [{ display_name: 'Graph Theory' }, { display_name: 'Other' }] }),
                ctx
            );
            expect(paper.primary_topic).toBe('Graph Theory');
        });

        it('should read citation metrics', () => {
            const { paper } = normalizeOk(
                makeWork('W1', { fwci: 1.25, citation_normalized_percentile: { value: 0.5 } }),
                ctx
            );
            expect(paper.fwci).toBe(1.25);
            expect(paper.citation_percentile).toBe(50);
        });

        it('should detect a non-empty abstract index', () => {
            expect(normalizeOk(makeWork('W1', { abstract_inverted_index: { Hello: [0] } }), ctx).paper.has_abstract).toBe(true);
            expect(normalizeOk(makeWork('W2', { abstract_inverted_index: {} }), ctx).paper.has_abstract).toBe(false);
        });

        it('should score domain relevance from the vocabulary', () => {
            const { paper } = normalizeOk(makeWork('W1', { title: 'Deep learning for soil' }), ctx);
            expect(paper.is_domain_relevant).toBe(true);
            expect(paper.domain_relevance_score).toBe(0.5);
        });

        it('should keep the fetch-time score separately', () => {
            const { paper } = normalizeOk(makeWork('W1', { _relevance_score: 0.83 }), ctx);
            expect(paper.fetch_relevance_score).toBe(0.83);
            expect(normalizeOk(makeWork('W2'), ctx).paper.fetch_relevance_score).toBeNull();
        });

        it('should default counts and flags', () => {
            const { paper } = normalizeOk({ id: 'https://openalex.org/W9', title: 'Bare' }, ctx);

            expect(paper.author_count).toBe(0);
            expect(paper.cited_by_count).toBe(0);
            expect(paper.referenced_works_count).toBe(0);
            expect(paper.is_retracted).toBe(false);
            expect(paper.is_paratext).toBe(false);
            expect(paper.journal_name).toBeNull();
            expect(paper.first_author_name).toBeNull();
            expect(paper.doi).toBeNull();
        });

        it('should degrade mistyped fields to null', () => {
            const { paper, authors } = normalizeOk(
                { id: 'https://openalex.org/W9', title: 'Odd', primary_location: 'nowhere', authorships: 'many', cited_by_count: '7' },
                ctx
            );

            expect(paper.journal_name).toBeNull();
            expect(paper.author_count).toBe(0);
            expect(paper.cited_by_count).toBe(0);
            expect(authors).toEqual([]);
        });
    });

    describe('failures', () => {
        it('should reject a work without an id', () => {
            const result = normalizeWork({ title: 'Orphan' }, ctx);

            expect(result.ok).toBe(false);
            if (result.ok) return;
            expect(result.error).toBeInstanceOf(NormalizationError);
            expect(result.error.title).toBe('Orphan');
        });

        it('should not throw on non-object input', () => {
            expect(normalizeWork(null, ctx).ok).toBe(false);
            expect(normalizeWork('W1', ctx).ok).toBe(false);
            expect(normalizeWork(42, ctx).ok).toBe(false);
        });
    });

    describe('DOI tracking', () => {
        it('should drop a DOI already claimed by another paper in the run', () => {
            const first = normalizeOk(makeWork('W1', { doi: 'https://doi.org/10.1/shared' }), ctx);
            const second = normalizeOk(makeWork('W2', { doi: 'https://doi.org/10.1/shared' }), ctx);

            expect(first.paper.doi).toBe('10.1/shared');
            expect(second.paper.doi).toBeNull();
            expect(ctx.duplicateDoisDropped).toBe(1);
        });

        it('should keep the DOI when the same paper appears again', () => {
            normalizeOk(makeWork('W1'), ctx);
            expect(normalizeOk(makeWork('W1'), ctx).paper.doi).toBe('10.1000/w1');
            expect(ctx.duplicateDoisDropped).toBe(0);
        });

        it('should forget claims after a reset', () => {
            normalizeOk(makeWork('W1', { doi: '10.1/shared' }), ctx);
            ctx.reset();
            expect(normalizeOk(makeWork('W2', { doi: '10.1/shared' }), ctx).paper.doi).toBe('10.1/shared');
        });
    });

    describe('authorships', () => {
        it('should build author and link rows in source order', () => {
            const { authors, authorships } = normalizeOk(makeWork('W1'), ctx);

            expect(authors.map((a) => a.author_id)).toEqual(['AW11', 'AW12']);
            expect(authorships.map((a) => [a.author_id, a.author_sequence, a.author_position])).toEqual([
                ['AW11', 1, 'first'],
                ['AW12', 2, 'last'],
            ]);
        });

        it('should skip authorships without an author id but keep sequence positions', () => {
            const work = makeWork('W1', {
                authorships: [
                    { author_position: 'first', author: { display_name: 'No Id' } },
                    { author_position: 'last', author: { id: 'https://openalex.org/A2' } },
                ],
            });
            const { paper, authors, authorships } = normalizeOk(work, ctx);

            expect(paper.author_count).toBe(2);
            expect(authors).toHaveLength(1);
            expect(authorships).toHaveLength(1);
            expect(authorships[0]?.author_sequence).toBe(2);
        });
    });
});

describe('toAuthorRow', () => {
    it('should strip the ORCID prefix and take the first affiliation', () => {
        const row = toAuthorRow({
            author: { id: 'https://openalex.org/A7', display_name: 'Cy Person', orcid: 'https://orcid.org/0000-0001-0000-0007' },
            institutions: [{ display_name: 'First Inst' }, { display_name: 'Second Inst' }],
            countries: ['DE', 'FR'],
        });

        expect(row).toEqual({
            author_id: 'A7',
            display_name: 'Cy Person',
            orcid: '0000-0001-0000-0007',
            primary_institution: 'First Inst',
            primary_country: 'DE',
        });
    });

    it('should use the placeholder name when none is given', () => {
        expect(toAuthorRow({ author: { id: 'A8' } })?.display_name).toBe(UNKNOWN_AUTHOR_NAME);
    });

    it('should return null without an author id', () => {
        expect(toAuthorRow({ author: { display_name: 'Nobody' } })).toBeNull();
    });
});

describe('toAuthorshipRow', () => {
    it('should collect affiliations', () => {
        const row = toAuthorshipRow(
            'W1',
            {
                author_position: 'middle',
                author: { id: 'https://openalex.org/A3' },
                institutions: [{ id: 'https://openalex.org/I9', display_name: 'Lab' }, { display_name: 'No Id Lab' }],
                countries: ['US'],
                is_corresponding: true,
                raw_affiliation_strings: ['Lab, Somewhere'],
            },
            3
        );

        expect(row).toEqual({
            paper_id: 'W1',
            author_id: 'A3',
            author_position: 'middle',
            author_sequence: 3,
            is_corresponding: true,
            institution_names: ['Lab', 'No Id Lab'],
            institution_ids: ['I9'],
            countries: ['US'],
            raw_affiliation_strings: ['Lab, Somewhere'],
        });
    });

    it('should store empty arrays as null and unknown positions as null', () => {
        const row = toAuthorshipRow('W1', { author_position: 'sole', author: { id: 'A4' }, institutions: [] }, 1);

        expect(row?.author_position).toBeNull();
        expect(row?.is_corresponding).toBe(false);
        expect(row?.institution_names).toBeNull();
        expect(row?.countries).toBeNull();
        expect(row?.raw_affiliation_strings).toBeNull();
    });
});
