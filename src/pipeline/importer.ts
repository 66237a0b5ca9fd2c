import type { EntityCounts, EntityKind, ImportStats, UpsertResult } from '../types/index.js';
import { dedupeAuthors, dedupeAuthorships } from '../etl/dedupe.js';
import { normalizeWork } from '../etl/normalize.js';
import { RunContext } from '../etl/run-context.js';
import type { ResearchDatabase } from '../storage/database.js';
import { WriteError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * The writes the importer needs from the store.
 */
export type UpsertTarget = Pick<ResearchDatabase, 'upsertAuthors' | 'upsertPapers' | 'upsertAuthorships'>;

export interface PaperImporterOptions {
    /** Store to write to; omitted for a dry run */
    target?: UpsertTarget;
    context?: RunContext;
}

export interface ImportRunResult {
    stats: ImportStats;
    /** True when a stop request ended the loop before the last work */
    stopped: boolean;
}

export function emptyImportStats(): ImportStats {
    const counts = (): EntityCounts => ({ inserted: 0, updated: 0, failed: 0 });
    return {
        processed: 0,
        failed: 0,
        normalizationFailures: 0,
        duplicateAuthorships: 0,
        duplicateDoisDropped: 0,
        papers: counts(),
        authors: counts(),
        paperAuthors: counts(),
    };
}

/**
 * Imports raw works one at a time: normalize, then write authors, the
 * paper and its authorship links, in that order.
 *
 * A failing work is logged and counted, never rethrown, so one bad record
 * does not stop the batch. Writes already committed for that work stay.
 */
export class PaperImporter {
    private readonly target: UpsertTarget | undefined;
    private readonly context: RunContext;
    private stats: ImportStats = emptyImportStats();

    constructor(options: PaperImporterOptions = {}) {
        this.target = options.target;
        this.context = options.context ?? new RunContext();
    }

    get dryRun(): boolean {
        return this.target === undefined;
    }

    getStats(): ImportStats {
        return this.stats;
    }

    /**
     * Clear counters and the run context.
     */
    reset(): void {
        this.stats = emptyImportStats();
        this.context.reset();
    }

    /**
     * Import every work in order, checking `shouldStop` before each one.
     */
    importAll(works: readonly unknown[], shouldStop: () => boolean = () => false): ImportRunResult {
        const logger = getLogger();

        for (const [index, work] of works.entries()) {
            if (shouldStop()) {
                logger.warn({ imported: index, remaining: works.length - index }, 'Stop requested, ending import');
                return { stats: this.stats, stopped: true };
            }
            this.importWork(work);
        }

        return { stats: this.stats, stopped: false };
    }

    /**
     * Import one raw work. Returns true when every write for it succeeded.
     */
    importWork(raw: unknown): boolean {
        const logger = getLogger();
        this.stats.processed++;

        const normalized = normalizeWork(raw, this.context);
        this.stats.duplicateDoisDropped = this.context.duplicateDoisDropped;

        if (!normalized.ok) {
            this.stats.normalizationFailures++;
            this.stats.failed++;
            logger.warn({ title: normalized.error.title }, normalized.error.message);
            return false;
        }

        const { paper } = normalized;
        const authors = dedupeAuthors(normalized.authors);
        const authorships = dedupeAuthorships(normalized.authorships);
        this.stats.duplicateAuthorships += authorships.duplicates;

        if (!this.target) {
            logger.debug({ paperId: paper.paper_id, authors: authors.length }, 'Normalized (dry run)');
            return true;
        }

        try {
            if (authors.length > 0) {
                this.record('authors', this.target.upsertAuthors(authors));
            }
            this.record('papers', this.target.upsertPapers([paper]));
            if (authorships.rows.length > 0) {
                this.record('paper_authors', this.target.upsertAuthorships(authorships.rows));
            }
        } catch (error) {
            this.stats.failed++;
            if (error instanceof WriteError) {
                this.countsFor(error.entity).failed += error.batchSize;
            }
            logger.error({ paperId: paper.paper_id, err: errorMessage(error) }, 'Failed to import paper');
            return false;
        }

        logger.debug({ paperId: paper.paper_id, authors: authors.length }, 'Imported paper');
        return true;
    }

    private record(entity: EntityKind, result: UpsertResult): void {
        const counts = this.countsFor(entity);
        counts.inserted += result.inserted;
        counts.updated += result.updated;
    }

    private countsFor(entity: EntityKind): EntityCounts {
        switch (entity) {
            case 'authors':
                return this.stats.authors;
            case 'papers':
                return this.stats.papers;
            case 'paper_authors':
                return this.stats.paperAuthors;
        }
    }
}

/**
 * Human-readable summary of one import, one line per counter.
 */
export function formatImportSummary(stats: ImportStats): string {
    const entity = (label: string, counts: EntityCounts): string =>
        `  ${label.padEnd(14)} inserted ${counts.inserted}, updated ${counts.updated}, failed ${counts.failed}`;

    return [
        'Import summary',
        `  Processed:     ${stats.processed}`,
        `  Failed:        ${stats.failed} (${stats.normalizationFailures} unreadable)`,
        entity('Authors:', stats.authors),
        entity('Papers:', stats.papers),
        entity('Authorships:', stats.paperAuthors),
        `  Duplicate authorships skipped: ${stats.duplicateAuthorships}`,
        `  Duplicate DOIs dropped:        ${stats.duplicateDoisDropped}`,
    ].join('\n');
}
