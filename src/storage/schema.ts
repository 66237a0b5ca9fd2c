/**
 * SQLite schema migration v1.
 * Creates the papers, authors and paper_authors tables, the author metrics
 * triggers and the reporting views.
 *
 * Array columns hold JSON text; booleans are 0/1.
 */
export const MIGRATION_V1 = `
-- Papers: one row per OpenAlex work
CREATE TABLE IF NOT EXISTS papers (
  paper_id TEXT PRIMARY KEY,
  doi TEXT,
  title TEXT NOT NULL,

  publication_year INTEGER CHECK (publication_year BETWEEN 1900 AND 2100),
  publication_date TEXT,
  paper_type TEXT,
  language TEXT,

  journal_name TEXT,
  publisher TEXT,
  journal_issn TEXT,
  is_core_journal INTEGER,

  is_open_access INTEGER,
  oa_status TEXT,
  pdf_url TEXT,
  landing_page_url TEXT,
  license TEXT,

  author_count INTEGER NOT NULL DEFAULT 0 CHECK (author_count >= 0),
  first_author_name TEXT,
  corresponding_author_name TEXT,
  institution_count INTEGER NOT NULL DEFAULT 0 CHECK (institution_count >= 0),
  country_count INTEGER NOT NULL DEFAULT 0 CHECK (country_count >= 0),
  first_institution TEXT,
  first_country TEXT,

  cited_by_count INTEGER NOT NULL DEFAULT 0 CHECK (cited_by_count >= 0),
  referenced_works_count INTEGER NOT NULL DEFAULT 0 CHECK (referenced_works_count >= 0),
  fwci REAL,
  citation_percentile REAL,

  primary_topic TEXT,
  top_concept_1 TEXT,
  top_concept_2 TEXT,
  top_concept_3 TEXT,
  keywords TEXT,

  is_retracted INTEGER NOT NULL DEFAULT 0,
  is_paratext INTEGER NOT NULL DEFAULT 0,
  has_abstract INTEGER NOT NULL DEFAULT 0,

  domain_relevance_score REAL,
  is_domain_relevant INTEGER,
  fetch_relevance_score REAL,

  created_date TEXT,
  updated_date TEXT,
  ingested_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Authors, with metrics kept current by the paper_authors triggers
CREATE TABLE IF NOT EXISTS authors (
  author_id TEXT PRIMARY KEY,
  display_name TEXT NOT NULL,
  orcid TEXT,
  total_papers INTEGER NOT NULL DEFAULT 0 CHECK (total_papers >= 0),
  total_citations INTEGER NOT NULL DEFAULT 0 CHECK (total_citations >= 0),
  h_index INTEGER,
  primary_institution TEXT,
  primary_country TEXT,
  first_seen_date TEXT,
  last_seen_date TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
);

-- Paper-Author junction
CREATE TABLE IF NOT EXISTS paper_authors (
  paper_id TEXT NOT NULL REFERENCES papers(paper_id) ON DELETE CASCADE,
  author_id TEXT NOT NULL REFERENCES authors(author_id) ON DELETE CASCADE,
  author_position TEXT CHECK (author_position IN ('first', 'middle', 'last')),
  author_sequence INTEGER CHECK (author_sequence > 0),
  is_corresponding INTEGER NOT NULL DEFAULT 0,
  institution_names TEXT,
  institution_ids TEXT,
  countries TEXT,
  raw_affiliation_strings TEXT,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (paper_id, author_id)
);

-- Identifiers unique when present
CREATE UNIQUE INDEX IF NOT EXISTS idx_papers_doi ON papers(doi) WHERE doi IS NOT NULL;
CREATE UNIQUE INDEX IF NOT EXISTS idx_authors_orcid ON authors(orcid) WHERE orcid IS NOT NULL;

CREATE INDEX IF NOT EXISTS idx_papers_publication_year ON papers(publication_year);
CREATE INDEX IF NOT EXISTS idx_papers_publication_date ON papers(publication_date);
CREATE INDEX IF NOT EXISTS idx_papers_ingested_at ON papers(ingested_at);
CREATE INDEX IF NOT EXISTS idx_papers_cited_by_count ON papers(cited_by_count);
CREATE INDEX IF NOT EXISTS idx_papers_journal_name ON papers(journal_name);
CREATE INDEX IF NOT EXISTS idx_papers_primary_topic ON papers(primary_topic);
CREATE INDEX IF NOT EXISTS idx_papers_is_retracted ON papers(is_retracted);

CREATE INDEX IF NOT EXISTS idx_authors_display_name ON authors(display_name);
CREATE INDEX IF NOT EXISTS idx_authors_total_citations ON authors(total_citations);

CREATE INDEX IF NOT EXISTS idx_paper_authors_author_id ON paper_authors(author_id);
CREATE INDEX IF NOT EXISTS idx_paper_authors_paper_position ON paper_authors(paper_id, author_position);

-- Author metrics
CREATE TRIGGER IF NOT EXISTS trg_paper_authors_metrics_insert
AFTER INSERT ON paper_authors
BEGIN
  UPDATE authors SET
    total_papers = (SELECT COUNT(DISTINCT pa.paper_id) FROM paper_authors pa WHERE pa.author_id = NEW.author_id),
    total_citations = (
      SELECT COALESCE(SUM(p.cited_by_count), 0)
      FROM paper_authors pa JOIN papers p ON pa.paper_id = p.paper_id
      WHERE pa.author_id = NEW.author_id
    ),
    first_seen_date = (
      SELECT MIN(p.publication_date)
      FROM paper_authors pa JOIN papers p ON pa.paper_id = p.paper_id
      WHERE pa.author_id = NEW.author_id
    ),
    last_seen_date = (
      SELECT MAX(p.publication_date)
      FROM paper_authors pa JOIN papers p ON pa.paper_id = p.paper_id
      WHERE pa.author_id = NEW.author_id
    ),
    updated_at = datetime('now')
  WHERE author_id = NEW.author_id;
END;

CREATE TRIGGER IF NOT EXISTS trg_paper_authors_metrics_update
AFTER UPDATE ON paper_authors
BEGIN
  UPDATE authors SET
    total_papers = (SELECT COUNT(DISTINCT pa.paper_id) FROM paper_authors pa WHERE pa.author_id = NEW.author_id),
    total_citations = (
      SELECT COALESCE(SUM(p.cited_by_count), 0)
      FROM paper_authors pa JOIN papers p ON pa.paper_id = p.paper_id
      WHERE pa.author_id = NEW.author_id
    ),
    first_seen_date = (
      SELECT MIN(p.publication_date)
      FROM paper_authors pa JOIN papers p ON pa.paper_id = p.paper_id
      WHERE pa.author_id = NEW.author_id
    ),
    last_seen_date = (
      SELECT MAX(p.publication_date)
      FROM paper_authors pa JOIN papers p ON pa.paper_id = p.paper_id
      WHERE pa.author_id = NEW.author_id
    ),
    updated_at = datetime('now')
  WHERE author_id = NEW.author_id;
END;

-- Views
CREATE VIEW IF NOT EXISTS first_authors AS
SELECT pa.paper_id, pa.author_id, a.display_name, a.orcid, pa.institution_names, pa.countries
FROM paper_authors pa
JOIN authors a ON pa.author_id = a.author_id
WHERE pa.author_position = 'first';

CREATE VIEW IF NOT EXISTS corresponding_authors AS
SELECT pa.paper_id, pa.author_id, a.display_name, a.orcid, pa.institution_names, pa.countries
FROM paper_authors pa
JOIN authors a ON pa.author_id = a.author_id
WHERE pa.is_corresponding = 1;

CREATE VIEW IF NOT EXISTS author_productivity AS
SELECT
  a.author_id,
  a.display_name,
  a.orcid,
  a.total_papers,
  a.total_citations,
  a.h_index,
  ROUND(CAST(a.total_citations AS REAL) / NULLIF(a.total_papers, 0), 2) AS avg_citations_per_paper,
  a.primary_institution,
  a.primary_country,
  a.first_seen_date,
  a.last_seen_date,
  CAST(strftime('%Y', a.last_seen_date) AS INTEGER) - CAST(strftime('%Y', a.first_seen_date) AS INTEGER) + 1 AS years_active
FROM authors a
WHERE a.total_papers > 0
ORDER BY a.total_citations DESC;
`;

export const SCHEMA_VERSION = 1;

export const TABLES = ['papers', 'authors', 'paper_authors'] as const;
