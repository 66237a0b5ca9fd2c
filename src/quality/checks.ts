import type { QualityCheck } from '../types/index.js';

const papersMatching = (where: string, columns: string, orderBy?: string) => ({
    countSql: `SELECT COUNT(*) AS failure_count FROM papers WHERE ${where}`,
    sampleSql: `SELECT ${columns} FROM papers WHERE ${where}${orderBy ? ` ORDER BY ${orderBy}` : ''} LIMIT @limit`,
});

const AUTHOR_COUNTS = `
  LEFT JOIN (SELECT paper_id, COUNT(*) AS actual_count FROM paper_authors GROUP BY paper_id) pa
    ON p.paper_id = pa.paper_id
  WHERE p.author_count IS NOT NULL AND COALESCE(pa.actual_count, 0) != p.author_count`;

const DATE_YEAR = `CAST(strftime('%Y', publication_date) AS INTEGER)`;

const MISSING_FIRST_AUTHOR = `
  p.first_author_name IS NOT NULL
  AND NOT EXISTS (
    SELECT 1 FROM paper_authors pa WHERE pa.paper_id = p.paper_id AND pa.author_position = 'first'
  )`;

/**
 * Ordered quality checks run against the store after each load.
 * Read-only: every statement is a SELECT.
 */
export const QUALITY_CHECKS: readonly QualityCheck[] = [
    // 1. Data Completeness
    {
        id: '1.1',
        name: 'Missing or empty titles',
        category: 'Data Completeness',
        description: 'Papers whose title is null or blank',
        ...papersMatching(`title IS NULL OR TRIM(title) = ''`, 'paper_id, doi, title, publication_year, created_date'),
        params: [],
    },
    {
        id: '1.2',
        name: 'Missing publication year and date',
        category: 'Data Completeness',
        description: 'Papers with neither a publication year nor a publication date',
        ...papersMatching(
            'publication_year IS NULL AND publication_date IS NULL',
            'paper_id, doi, title, publication_year, publication_date, journal_name, created_date',
            'created_date DESC'
        ),
        params: [],
    },
    {
        id: '1.3',
        name: 'Papers without authors',
        category: 'Data Completeness',
        description: 'Papers with no row in paper_authors',
        countSql: `
          SELECT COUNT(*) AS failure_count FROM papers p
          LEFT JOIN paper_authors pa ON p.paper_id = pa.paper_id
          WHERE pa.paper_id IS NULL`,
        sampleSql: `
          SELECT p.paper_id, p.doi, p.title, p.publication_year, p.author_count, p.first_author_name
          FROM papers p
          LEFT JOIN paper_authors pa ON p.paper_id = pa.paper_id
          WHERE pa.paper_id IS NULL
          ORDER BY p.created_date DESC
          LIMIT @limit`,
        params: [],
    },

    // 2. Data Validity
    {
        id: '2.1',
        name: 'Invalid publication years',
        category: 'Data Validity',
        description: 'Publication years outside the accepted range',
        ...papersMatching(
            'publication_year IS NOT NULL AND (publication_year < @minPublicationYear OR publication_year > @maxPublicationYear)',
            'paper_id, doi, title, publication_year, publication_date, created_date',
            'publication_year'
        ),
        params: ['minPublicationYear', 'maxPublicationYear'],
    },
    {
        id: '2.2',
        name: 'Negative citation or reference counts',
        category: 'Data Validity',
        description: 'Papers with a negative cited_by_count or referenced_works_count',
        ...papersMatching(
            'cited_by_count < 0 OR referenced_works_count < 0',
            'paper_id, doi, title, cited_by_count, referenced_works_count, publication_year',
            'cited_by_count, referenced_works_count'
        ),
        params: [],
    },
    {
        id: '2.3',
        name: 'Publication date/year mismatch',
        category: 'Data Validity',
        description: 'The year of publication_date differs from publication_year',
        ...papersMatching(
            `publication_year IS NOT NULL AND publication_date IS NOT NULL AND ${DATE_YEAR} != publication_year`,
            `paper_id, doi, title, publication_year, publication_date, ${DATE_YEAR} AS date_year`,
            `ABS(publication_year - ${DATE_YEAR}) DESC`
        ),
        params: [],
    },

    // 3. Business Logic
    {
        id: '3.1',
        name: 'Author count mismatch',
        category: 'Business Logic',
        description: 'author_count differs from the number of paper_authors rows',
        countSql: `SELECT COUNT(*) AS failure_count FROM papers p ${AUTHOR_COUNTS}`,
        sampleSql: `
          SELECT p.paper_id, p.doi, p.title, p.author_count, COALESCE(pa.actual_count, 0) AS actual_author_count
          FROM papers p ${AUTHOR_COUNTS}
          ORDER BY ABS(p.author_count - COALESCE(pa.actual_count, 0)) DESC
          LIMIT @limit`,
        params: [],
    },
    {
        id: '3.2',
        name: 'Open access flag/status inconsistency',
        category: 'Business Logic',
        description: 'is_open_access disagrees with oa_status',
        ...papersMatching(
            `(is_open_access = 1 AND oa_status IN ('closed', 'null'))
             OR (is_open_access = 0 AND oa_status IN ('gold', 'hybrid', 'green', 'bronze', 'diamond'))`,
            'paper_id, doi, title, is_open_access, oa_status, pdf_url, license',
            'publication_year DESC'
        ),
        params: [],
    },
    {
        id: '3.3',
        name: 'Invalid citation percentile',
        category: 'Business Logic',
        description: 'citation_percentile outside 0..100',
        ...papersMatching(
            'citation_percentile IS NOT NULL AND (citation_percentile < 0 OR citation_percentile > 100)',
            'paper_id, doi, title, citation_percentile, cited_by_count, publication_year',
            'citation_percentile DESC'
        ),
        params: [],
    },

    // 4. Data Quality
    {
        id: '4.1',
        name: 'Duplicate DOIs',
        category: 'Data Quality',
        description: 'DOIs shared by more than one paper',
        countSql: `
          SELECT COUNT(*) AS failure_count FROM (
            SELECT doi FROM papers WHERE doi IS NOT NULL GROUP BY doi HAVING COUNT(*) > 1
          )`,
        sampleSql: `
          SELECT doi, COUNT(*) AS paper_count, GROUP_CONCAT(paper_id, ', ') AS paper_ids
          FROM papers
          WHERE doi IS NOT NULL
          GROUP BY doi
          HAVING COUNT(*) > 1
          ORDER BY COUNT(*) DESC
          LIMIT @limit`,
        params: [],
    },
    {
        id: '4.2',
        name: 'Suspicious citation counts',
        category: 'Data Quality',
        description: 'Citation counts above the suspicious threshold',
        ...papersMatching(
            'cited_by_count > @suspiciousCitationThreshold',
            'paper_id, doi, title, cited_by_count, publication_year, journal_name, fwci, citation_percentile',
            'cited_by_count DESC'
        ),
        params: ['suspiciousCitationThreshold'],
    },
    {
        id: '4.3',
        name: 'Recently updated retracted papers',
        category: 'Data Quality',
        description: 'Retracted papers updated inside the review window',
        ...papersMatching(
            `is_retracted = 1 AND datetime(updated_date) > datetime('now', '-' || @retractedUpdateWindowDays || ' days')`,
            'paper_id, doi, title, is_retracted, updated_date, publication_year, journal_name, cited_by_count',
            'updated_date DESC'
        ),
        params: ['retractedUpdateWindowDays'],
    },

    // 5. Referential Integrity
    {
        id: '5.1',
        name: 'Orphaned paper_authors (paper)',
        category: 'Referential Integrity',
        description: 'paper_authors rows pointing at a missing paper',
        countSql: `
          SELECT COUNT(*) AS failure_count FROM paper_authors pa
          LEFT JOIN papers p ON pa.paper_id = p.paper_id
          WHERE p.paper_id IS NULL`,
        sampleSql: `
          SELECT pa.paper_id, pa.author_id, pa.author_position, pa.author_sequence, pa.created_at
          FROM paper_authors pa
          LEFT JOIN papers p ON pa.paper_id = p.paper_id
          WHERE p.paper_id IS NULL
          ORDER BY pa.created_at DESC
          LIMIT @limit`,
        params: [],
    },
    {
        id: '5.2',
        name: 'Orphaned paper_authors (author)',
        category: 'Referential Integrity',
        description: 'paper_authors rows pointing at a missing author',
        countSql: `
          SELECT COUNT(*) AS failure_count FROM paper_authors pa
          LEFT JOIN authors a ON pa.author_id = a.author_id
          WHERE a.author_id IS NULL`,
        sampleSql: `
          SELECT pa.paper_id, pa.author_id, pa.author_position, pa.author_sequence, pa.created_at
          FROM paper_authors pa
          LEFT JOIN authors a ON pa.author_id = a.author_id
          WHERE a.author_id IS NULL
          ORDER BY pa.created_at DESC
          LIMIT @limit`,
        params: [],
    },
    {
        id: '5.3',
        name: 'Missing first author in paper_authors',
        category: 'Referential Integrity',
        description: 'Papers naming a first author with no first-position link',
        countSql: `SELECT COUNT(*) AS failure_count FROM papers p WHERE ${MISSING_FIRST_AUTHOR}`,
        sampleSql: `
          SELECT p.paper_id, p.doi, p.title, p.first_author_name, p.author_count,
                 (SELECT COUNT(*) FROM paper_authors pa WHERE pa.paper_id = p.paper_id) AS actual_author_count
          FROM papers p
          WHERE ${MISSING_FIRST_AUTHOR}
          ORDER BY p.publication_year DESC
          LIMIT @limit`,
        params: [],
    },

    // 6. Timestamps & Metadata
    {
        id: '6.1',
        name: 'Future-dated papers',
        category: 'Timestamps & Metadata',
        description: 'Publication dates after today',
        ...papersMatching(
            `date(publication_date) > date('now')`,
            'paper_id, doi, title, publication_date, publication_year, created_date',
            'publication_date DESC'
        ),
        params: [],
    },
    {
        id: '6.2',
        name: 'Invalid ingestion timestamps',
        category: 'Timestamps & Metadata',
        description: 'Papers ingested before their source record was created',
        ...papersMatching(
            'created_date IS NOT NULL AND datetime(ingested_at) < datetime(created_date)',
            'paper_id, doi, title, created_date, ingested_at, publication_year',
            'created_date DESC'
        ),
        params: [],
    },
];
