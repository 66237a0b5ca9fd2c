import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PaperImporter, formatImportSummary, emptyImportStats, type UpsertTarget } from '../pipeline/importer.js';
import { ResearchDatabase } from '../storage/database.js';
import { WriteError } from '../utils/errors.js';
import type { UpsertResult } from '../types/index.js';
import { makeWork } from './helpers.js';

function ok(count: number): UpsertResult {
    return { inserted: count, updated: 0, rows: [] };
}

/**
 * Every stored row for the W1/W2 fixtures, without the write timestamps.
 */
function storedRows(db: ResearchDatabase): unknown[] {
    const rows: unknown[] = [];
    for (const paperId of ['W1', 'W2']) {
        const paper = db.getPaper(paperId);
        if (paper) {
            const { ingested_at: _ingested, ...values } = paper;
            rows.push(values);
        }
        for (const link of db.getAuthorships(paperId)) {
            rows.push(link);
            const author = db.getAuthor(link.author_id);
            if (author) {
                const { updated_at: _updated, ...values } = author;
                rows.push(values);
            }
        }
    }
    return rows;
}

describe('PaperImporter', () => {
    let db: ResearchDatabase;
    let importer: PaperImporter;

    beforeEach(() => {
        db = new ResearchDatabase(':memory:');
        db.ensureSchema();
        importer = new PaperImporter({ target: db });
    });

    afterEach(() => {
        db.close();
    });

    it('should write authors, the paper and its links', () => {
        expect(importer.importWork(makeWork('W1'))).toBe(true);

        const stats = importer.getStats();
        expect(stats.processed).toBe(1);
        expect(stats.failed).toBe(0);
        expect(stats.authors).toEqual({ inserted: 2, updated: 0, failed: 0 });
        expect(stats.papers).toEqual({ inserted: 1, updated: 0, failed: 0 });
        expect(stats.paperAuthors).toEqual({ inserted: 2, updated: 0, failed: 0 });
        expect(db.getStats()).toEqual({ papers: 1, authors: 2, paper_authors: 2 });
    });

    it('should write in dependency order', () => {
        const calls: string[] = [];
        const target: UpsertTarget = {
            upsertAuthors: (rows) => {
                calls.push('authors');
                return ok(rows.length);
            },
            upsertPapers: (rows) => {
                calls.push('papers');
                return ok(rows.length);
            },
            upsertAuthorships: (rows) => {
                calls.push('paper_authors');
                return ok(rows.length);
            },
        };

        new PaperImporter({ target }).importWork(makeWork('W1'));

        expect(calls).toEqual(['authors', 'papers', 'paper_authors']);
    });

    it('should skip author and link writes for a work without authorships', () => {
        const calls: string[] = [];
        const target: UpsertTarget = {
            upsertAuthors: () => {
                calls.push('authors');
                return ok(0);
            },
            upsertPapers: (rows) => {
                calls.push('papers');
                return ok(rows.length);
            },
            upsertAuthorships: () => {
                calls.push('paper_authors');
                return ok(0);
            },
        };

        new PaperImporter({ target }).importWork(makeWork('W1', { authorships: [] }));

        expect(calls).toEqual(['papers']);
    });

    it('should merge an author listed twice on one paper', () => {
        const work = makeWork('W1', {
            authorships: [
                {
                    author_position: 'first',
                    author: { id: 'https://openalex.org/A1', display_name: 'Ada Example' },
                    institutions: [{ id: 'https://openalex.org/I1', display_name: 'X' }],
                    countries: ['GB'],
                },
                {
                    author_position: 'middle',
                    author: { id: 'https://openalex.org/A1', display_name: 'Ada Example' },
                    institutions: [],
                    countries: [],
                },
            ],
        });

        expect(importer.importWork(work)).toBe(true);

        expect(db.getAuthor('A1')?.primary_institution).toBe('X');
        expect(importer.getStats().duplicateAuthorships).toBe(1);

        const links = db.getAuthorships('W1');
        expect(links).toHaveLength(1);
        expect(links[0]?.author_sequence).toBe(1);
        expect(links[0]?.author_position).toBe('first');
    });

    it('should keep a stored DOI when a later record omits it', () => {
        importer.importWork(makeWork('W1'));
        importer.importWork(makeWork('W1', { doi: null }));

        expect(db.getPaper('W1')?.doi).toBe('10.1000/w1');
        expect(importer.getStats().papers).toEqual({ inserted: 1, updated: 1, failed: 0 });
    });

    it('should take a DOI for a paper stored without one and keep it when it goes missing again', () => {
        new PaperImporter({ target: db }).importWork(makeWork('W1', { doi: null }));
        expect(db.getPaper('W1')?.doi).toBeNull();

        new PaperImporter({ target: db }).importWork(makeWork('W1', { doi: '10.9/new' }));
        expect(db.getPaper('W1')?.doi).toBe('10.9/new');

        new PaperImporter({ target: db }).importWork(makeWork('W1', { doi: null }));
        expect(db.getPaper('W1')?.doi).toBe('10.9/new');
    });

    it('should clear status flags when a later record reports them false', () => {
        importer.importWork(
            makeWork('W1', { is_retracted: true, is_paratext: true, abstract_inverted_index: { Deep: [0], study: [1] } })
        );
        expect(db.getPaper('W1')).toMatchObject({ is_retracted: true, is_paratext: true, has_abstract: true });

        new PaperImporter({ target: db }).importWork(makeWork('W1'));

        expect(db.getPaper('W1')).toMatchObject({ is_retracted: false, is_paratext: false, has_abstract: false });
    });

    it('should be idempotent across runs', () => {
        const works = [makeWork('W1'), makeWork('W2')];

        importer.importAll(works);
        const before = db.getStats();
        const rowsBefore = storedRows(db);

        const second = new PaperImporter({ target: db });
        second.importAll(works);

        expect(db.getStats()).toEqual(before);
        expect(storedRows(db)).toEqual(rowsBefore);
        expect(before).toEqual({ papers: 2, authors: 4, paper_authors: 4 });
        expect(second.getStats().papers).toEqual({ inserted: 0, updated: 2, failed: 0 });
        expect(second.getStats().authors).toEqual({ inserted: 0, updated: 4, failed: 0 });
        expect(second.getStats().paperAuthors).toEqual({ inserted: 0, updated: 4, failed: 0 });
        expect(db.getAuthor('AW11')?.total_papers).toBe(1);
    });

    it('should drop a DOI already used by another paper in the same run', () => {
        importer.importAll([makeWork('W1', { doi: '10.1/shared' }), makeWork('W2', { doi: '10.1/shared' })]);

        expect(db.getPaper('W1')?.doi).toBe('10.1/shared');
        expect(db.getPaper('W2')?.doi).toBeNull();
        expect(importer.getStats().duplicateDoisDropped).toBe(1);
        expect(importer.getStats().failed).toBe(0);
    });

    it('should count unreadable records and continue', () => {
        const { stats, stopped } = importer.importAll([{ title: 'No id' }, makeWork('W1')]);

        expect(stopped).toBe(false);
        expect(stats.processed).toBe(2);
        expect(stats.failed).toBe(1);
        expect(stats.normalizationFailures).toBe(1);
        expect(db.getStats().papers).toBe(1);
    });

    it('should count a failed paper write and keep the committed authors', () => {
        expect(importer.importWork(makeWork('W1', { title: null }))).toBe(false);

        const stats = importer.getStats();
        expect(stats.failed).toBe(1);
        expect(stats.papers).toEqual({ inserted: 0, updated: 0, failed: 1 });
        expect(stats.authors.inserted).toBe(2);
        expect(stats.paperAuthors).toEqual({ inserted: 0, updated: 0, failed: 0 });
        expect(db.getStats()).toEqual({ papers: 0, authors: 2, paper_authors: 0 });
    });

    it('should count the whole batch of a failed write', () => {
        const target: UpsertTarget = {
            upsertAuthors: (rows) => {
                throw new WriteError('Failed to upsert authors', 'authors', rows.length);
            },
            upsertPapers: (rows) => ok(rows.length),
            upsertAuthorships: (rows) => ok(rows.length),
        };
        const failing = new PaperImporter({ target });

        expect(failing.importWork(makeWork('W1'))).toBe(false);
        expect(failing.getStats().authors.failed).toBe(2);
        expect(failing.getStats().papers.inserted).toBe(0);
    });

    it('should stop before the next work when asked', () => {
        let checks = 0;
        const { stats, stopped } = importer.importAll([makeWork('W1'), makeWork('W2'), makeWork('W3')], () => checks++ >= 1);

        expect(stopped).toBe(true);
        expect(stats.processed).toBe(1);
        expect(db.getStats().papers).toBe(1);
    });

    it('should clear counters on reset', () => {
        importer.importWork(makeWork('W1'));
        importer.reset();

        expect(importer.getStats()).toEqual(emptyImportStats());
    });

    describe('dry run', () => {
        it('should normalize without writing', () => {
            const dry = new PaperImporter();
            const { stats } = dry.importAll([makeWork('W1'), { title: 'No id' }]);

            expect(dry.dryRun).toBe(true);
            expect(stats.processed).toBe(2);
            expect(stats.failed).toBe(1);
            expect(stats.papers).toEqual({ inserted: 0, updated: 0, failed: 0 });
        });
    });
});

describe('formatImportSummary', () => {
    it('should list every counter', () => {
        const stats = emptyImportStats();
        stats.processed = 3;
        stats.failed = 1;
        stats.normalizationFailures = 1;
        stats.papers.inserted = 2;
        stats.duplicateDoisDropped = 1;

        expect(formatImportSummary(stats).split('\n')).toEqual([
            'Import summary',
            '  Processed:     3',
            '  Failed:        1 (1 unreadable)',
            '  Authors:       inserted 0, updated 0, failed 0',
            '  Papers:        inserted 2, updated 0, failed 0',
            '  Authorships:   inserted 0, updated 0, failed 0',
            '  Duplicate authorships skipped: 0',
            '  Duplicate DOIs dropped:        1',
        ]);
    });
});
