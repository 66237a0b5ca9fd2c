import Database from 'better-sqlite3';
import {
    UNKNOWN_AUTHOR_NAME,
    type AuthorRow,
    type AuthorshipRow,
    type EntityKind,
    type PaperRow,
    type UpsertResult,
    type UpsertRowResult,
} from '../types/index.js';
import { OrderingViolationError, WriteError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { MIGRATION_V1, SCHEMA_VERSION, TABLES } from './schema.js';

// ─── Stored shapes ────────────────────────────────────────

export interface StoredPaper extends PaperRow {
    ingested_at: string;
}

export interface StoredAuthor extends AuthorRow {
    total_papers: number;
    total_citations: number;
    h_index: number | null;
    first_seen_date: string | null;
    last_seen_date: string | null;
    created_at: string;
    updated_at: string;
}

export interface StoredAuthorship extends AuthorshipRow {
    created_at: string;
}

export interface AuthorProductivity {
    author_id: string;
    display_name: string;
    orcid: string | null;
    total_papers: number;
    total_citations: number;
    avg_citations_per_paper: number | null;
    primary_institution: string | null;
    primary_country: string | null;
    first_seen_date: string | null;
    last_seen_date: string | null;
    years_active: number | null;
}

export interface DatabaseStats {
    papers: number;
    authors: number;
    paper_authors: number;
}

/**
 * `T` as SQLite holds it: booleans `B` as 0/1, arrays `J` as JSON text.
 */
type Encoded<T, B extends keyof T, J extends keyof T = never> = Omit<T, B | J> & {
    [K in B]: number | null;
} & {
    [K in J]: string | null;
};

type PaperBooleans = 'is_core_journal' | 'is_open_access' | 'is_retracted' | 'is_paratext' | 'has_abstract' | 'is_domain_relevant';
type AuthorshipArrays = 'institution_names' | 'institution_ids' | 'countries' | 'raw_affiliation_strings';

type PaperParams = Encoded<PaperRow, PaperBooleans, 'keywords'>;
type PaperRecord = Encoded<StoredPaper, PaperBooleans, 'keywords'>;
type AuthorshipParams = Encoded<AuthorshipRow, 'is_corresponding', AuthorshipArrays>;
type AuthorshipRecord = Encoded<StoredAuthorship, 'is_corresponding', AuthorshipArrays>;

// ─── Merge policy ─────────────────────────────────────────

/**
 * How a column is written when the row already exists.
 * `overwrite` takes the incoming value, `coalesce` keeps the stored value
 * when the incoming one is null, `key` is the conflict target.
 */
type MergeRule = 'key' | 'overwrite' | 'coalesce' | { sql: string };

const PAPER_MERGE: Record<keyof PaperRow, MergeRule> = {
    paper_id: 'key',
    doi: 'coalesce',
    title: 'overwrite',
    publication_year: 'coalesce',
    publication_date: 'coalesce',
    paper_type: 'coalesce',
    language: 'coalesce',
    journal_name: 'coalesce',
    publisher: 'coalesce',
    journal_issn: 'coalesce',
    is_core_journal: 'coalesce',
    is_open_access: 'coalesce',
    oa_status: 'coalesce',
    pdf_url: 'coalesce',
    landing_page_url: 'coalesce',
    license: 'coalesce',
    author_count: 'overwrite',
    first_author_name: 'coalesce',
    corresponding_author_name: 'coalesce',
    institution_count: 'overwrite',
    country_count: 'overwrite',
    first_institution: 'coalesce',
    first_country: 'coalesce',
    cited_by_count: 'overwrite',
    referenced_works_count: 'overwrite',
    fwci: 'coalesce',
    citation_percentile: 'coalesce',
    primary_topic: 'coalesce',
    top_concept_1: 'coalesce',
    top_concept_2: 'coalesce',
    top_concept_3: 'coalesce',
    keywords: 'coalesce',
    is_retracted: 'overwrite',
    is_paratext: 'overwrite',
    has_abstract: 'overwrite',
    domain_relevance_score: 'coalesce',
    is_domain_relevant: 'coalesce',
    fetch_relevance_score: 'coalesce',
    created_date: 'coalesce',
    updated_date: 'overwrite',
};

const AUTHOR_MERGE: Record<keyof AuthorRow, MergeRule> = {
    author_id: 'key',
    display_name: { sql: `COALESCE(NULLIF(excluded.display_name, '${UNKNOWN_AUTHOR_NAME}'), authors.display_name)` },
    orcid: 'coalesce',
    primary_institution: 'coalesce',
    primary_country: 'coalesce',
};

const AUTHORSHIP_MERGE: Record<keyof AuthorshipRow, MergeRule> = {
    paper_id: 'key',
    author_id: 'key',
    author_position: 'overwrite',
    author_sequence: 'overwrite',
    is_corresponding: 'overwrite',
    institution_names: 'coalesce',
    institution_ids: 'coalesce',
    countries: 'coalesce',
    raw_affiliation_strings: 'coalesce',
};

/**
 * Build `INSERT ... ON CONFLICT DO UPDATE` from a merge policy.
 * `touch` lists extra assignments applied on every update.
 */
export function buildUpsertSql(table: string, policy: Record<string, MergeRule>, touch: string[] = []): string {
    const columns = Object.keys(policy);
    const keys = columns.filter((c) => policy[c] === 'key');

    const assignments = columns.flatMap((column) => {
        const rule = policy[column];
        if (rule === undefined || rule === 'key') return [];
        if (rule === 'overwrite') return [`${column} = excluded.${column}`];
        if (rule === 'coalesce') return [`${column} = COALESCE(excluded.${column}, ${table}.${column})`];
        return [`${column} = ${rule.sql}`];
    });

    return `
      INSERT INTO ${table} (${columns.join(', ')})
      VALUES (${columns.map((c) => `@${c}`).join(', ')})
      ON CONFLICT(${keys.join(', ')}) DO UPDATE SET
        ${[...assignments, ...touch].join(',\n        ')}
    `;
}

const UPSERT_PAPER_SQL = buildUpsertSql('papers', PAPER_MERGE, ["ingested_at = datetime('now')"]);
const UPSERT_AUTHOR_SQL = buildUpsertSql('authors', AUTHOR_MERGE, ["updated_at = datetime('now')"]);
const UPSERT_AUTHORSHIP_SQL = buildUpsertSql('paper_authors', AUTHORSHIP_MERGE);

/**
 * Research store wrapper around better-sqlite3.
 * Handles schema migration, WAL mode, foreign keys, and the three
 * idempotent entity upserts.
 */
export class ResearchDatabase {
    private db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);

        // Set pragmas
        this.db.pragma('journal_mode = WAL');
        this.db.pragma('foreign_keys = ON');

        getLogger().debug({ dbPath }, 'Database opened');
    }

    /**
     * Run pending schema migrations. Returns true when anything was applied.
     */
    ensureSchema(): boolean {
        const currentVersion = Number(this.db.pragma('user_version', { simple: true }));

        if (currentVersion >= SCHEMA_VERSION) {
            getLogger().debug({ version: currentVersion }, 'Schema up to date');
            return false;
        }

        this.transaction(() => {
            this.db.exec(MIGRATION_V1);
            this.db.pragma(`user_version = ${SCHEMA_VERSION}`);
        });
        getLogger().info({ version: SCHEMA_VERSION }, 'Database migrated');
        return true;
    }

    hasSchema(): boolean {
        const row = this.db
            .prepare<[], { count: number }>(
                `SELECT COUNT(*) AS count FROM sqlite_master WHERE type = 'table' AND name IN ('papers', 'authors', 'paper_authors')`
            )
            .get();
        return row?.count === TABLES.length;
    }

    // ─── Upserts ──────────────────────────────────────────────

    /**
     * Insert or merge authors in one transaction.
     */
    upsertAuthors(authors: readonly AuthorRow[]): UpsertResult {
        const exists = this.db.prepare<[string], { found: number }>('SELECT 1 AS found FROM authors WHERE author_id = ?');
        const upsert = this.db.prepare<[AuthorRow]>(UPSERT_AUTHOR_SQL);

        return this.upsertBatch('authors', authors, (author) => {
            const existed = exists.get(author.author_id) !== undefined;
            upsert.run(author);
            return { id: author.author_id, action: existed ? 'updated' : 'inserted' };
        });
    }

    /**
     * Insert or merge papers in one transaction.
     * Every author the papers reference must already be written.
     */
    upsertPapers(papers: readonly PaperRow[]): UpsertResult {
        const exists = this.db.prepare<[string], { found: number }>('SELECT 1 AS found FROM papers WHERE paper_id = ?');
        const upsert = this.db.prepare<[PaperParams]>(UPSERT_PAPER_SQL);

        return this.upsertBatch('papers', papers, (paper) => {
            const existed = exists.get(paper.paper_id) !== undefined;
            upsert.run(encodePaper(paper));
            return { id: paper.paper_id, action: existed ? 'updated' : 'inserted' };
        });
    }

    /**
     * Insert or merge paper/author links in one transaction.
     * Both sides of every link must already exist.
     */
    upsertAuthorships(authorships: readonly AuthorshipRow[]): UpsertResult {
        const exists = this.db.prepare<[string, string], { found: number }>(
            'SELECT 1 AS found FROM paper_authors WHERE paper_id = ? AND author_id = ?'
        );
        const upsert = this.db.prepare<[AuthorshipParams]>(UPSERT_AUTHORSHIP_SQL);

        return this.upsertBatch('paper_authors', authorships, (link) => {
            const existed = exists.get(link.paper_id, link.author_id) !== undefined;
            upsert.run(encodeAuthorship(link));
            return { id: `${link.paper_id}:${link.author_id}`, action: existed ? 'updated' : 'inserted' };
        });
    }

    private upsertBatch<T>(entity: EntityKind, rows: readonly T[], write: (row: T) => UpsertRowResult): UpsertResult {
        if (rows.length === 0) {
            return { inserted: 0, updated: 0, rows: [] };
        }

        let results: UpsertRowResult[];
        try {
            results = this.transaction(() => rows.map(write));
        } catch (error) {
            const message = `Failed to upsert ${rows.length} ${entity}: ${errorMessage(error)}`;
            if (error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_FOREIGNKEY') {
                throw new OrderingViolationError(message, entity, rows.length, { cause: error });
            }
            throw new WriteError(message, entity, rows.length, { cause: error });
        }

        const inserted = results.filter((r) => r.action === 'inserted').length;
        const summary = { inserted, updated: results.length - inserted, rows: results };
        getLogger().debug({ entity, inserted: summary.inserted, updated: summary.updated }, 'Upserted batch');
        return summary;
    }

    // ─── Reads ────────────────────────────────────────────────

    getPaper(paperId: string): StoredPaper | undefined {
        const row = this.db.prepare<[string], PaperRecord>('SELECT * FROM papers WHERE paper_id = ?').get(paperId);
        return row && decodePaper(row);
    }

    getPaperByDoi(doi: string): StoredPaper | undefined {
        const row = this.db.prepare<[string], PaperRecord>('SELECT * FROM papers WHERE doi = ?').get(doi);
        return row && decodePaper(row);
    }

    getAuthor(authorId: string): StoredAuthor | undefined {
        return this.db.prepare<[string], StoredAuthor>('SELECT * FROM authors WHERE author_id = ?').get(authorId);
    }

    /**
     * Links of one paper in author order.
     */
    getAuthorships(paperId: string): StoredAuthorship[] {
        return this.db
            .prepare<[string], AuthorshipRecord>('SELECT * FROM paper_authors WHERE paper_id = ? ORDER BY author_sequence')
            .all(paperId)
            .map(decodeAuthorship);
    }

    getStats(): DatabaseStats {
        const count = (table: (typeof TABLES)[number]): number =>
            this.db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM ${table}`).get()?.count ?? 0;

        return { papers: count('papers'), authors: count('authors'), paper_authors: count('paper_authors') };
    }

    /**
     * Most cited authors from the `author_productivity` view.
     */
    getAuthorProductivity(limit = 10): AuthorProductivity[] {
        return this.db
            .prepare<[number], AuthorProductivity>(
                `SELECT author_id, display_name, orcid, total_papers, total_citations, avg_citations_per_paper,
                        primary_institution, primary_country, first_seen_date, last_seen_date, years_active
                 FROM author_productivity LIMIT ?`
            )
            .all(limit);
    }

    // ─── Utility ──────────────────────────────────────────────

    /**
     * Execute a function within a transaction.
     */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    close(): void {
        this.db.close();
        getLogger().debug('Database closed');
    }

    /**
     * Get the raw better-sqlite3 instance (quality checks run their own SQL).
     */
    getRawDb(): Database.Database {
        return this.db;
    }
}

// ─── Encoding ─────────────────────────────────────────────

function toSqlBool(value: boolean | null): number | null {
    return value === null ? null : value ? 1 : 0;
}

function fromSqlBool(value: number | null): boolean | null {
    return value === null ? null : value !== 0;
}

function toSqlJson(values: string[] | null): string | null {
    return values === null ? null : JSON.stringify(values);
}

function fromSqlJson(text: string | null): string[] | null {
    if (text === null) return null;
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : null;
}

function encodePaper(paper: PaperRow): PaperParams {
    return {
        ...paper,
        is_core_journal: toSqlBool(paper.is_core_journal),
        is_open_access: toSqlBool(paper.is_open_access),
        is_retracted: toSqlBool(paper.is_retracted),
        is_paratext: toSqlBool(paper.is_paratext),
        has_abstract: toSqlBool(paper.has_abstract),
        is_domain_relevant: toSqlBool(paper.is_domain_relevant),
        keywords: toSqlJson(paper.keywords),
    };
}

function decodePaper(row: PaperRecord): StoredPaper {
    return {
        ...row,
        is_core_journal: fromSqlBool(row.is_core_journal),
        is_open_access: fromSqlBool(row.is_open_access),
        is_retracted: row.is_retracted === 1,
        is_paratext: row.is_paratext === 1,
        has_abstract: row.has_abstract === 1,
        is_domain_relevant: row.is_domain_relevant === 1,
        keywords: fromSqlJson(row.keywords),
    };
}

function encodeAuthorship(link: AuthorshipRow): AuthorshipParams {
    return {
        ...link,
        is_corresponding: toSqlBool(link.is_corresponding),
        institution_names: toSqlJson(link.institution_names),
        institution_ids: toSqlJson(link.institution_ids),
        countries: toSqlJson(link.countries),
        raw_affiliation_strings: toSqlJson(link.raw_affiliation_strings),
    };
}

function decodeAuthorship(row: AuthorshipRecord): StoredAuthorship {
    return {
        ...row,
        is_corresponding: row.is_corresponding === 1,
        institution_names: fromSqlJson(row.institution_names),
        institution_ids: fromSqlJson(row.institution_ids),
        countries: fromSqlJson(row.countries),
        raw_affiliation_strings: fromSqlJson(row.raw_affiliation_strings),
    };
}
