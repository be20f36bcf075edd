export const CREATE_PAPERS_TABLE = `
CREATE TABLE IF NOT EXISTS papers (
    id SERIAL PRIMARY KEY,
    title TEXT NOT NULL,
    authors TEXT[],
    abstract TEXT,
    keywords TEXT[],
    pdf_url TEXT NOT NULL,
    outline JSONB NOT NULL,
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
)`;

export const CREATE_PAPER_SECTIONS_TABLE = `
CREATE TABLE IF NOT EXISTS paper_sections (
    id SERIAL PRIMARY KEY,
    paper_id INTEGER REFERENCES papers(id) ON DELETE CASCADE,
    section_title TEXT NOT NULL,
    section_description TEXT,
    subsections TEXT[],
    summary TEXT,
    key_points TEXT[],
    methodologies JSONB,
    results JSONB,
    figures_and_tables JSONB,
    citations TEXT[],
    created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
)`;

export const CREATE_PAPER_SECTIONS_INDEX = `
CREATE INDEX IF NOT EXISTS idx_paper_sections_paper_id
ON paper_sections(paper_id)`;

/** Statements the persistence stage runs before every write. */
export const CORE_SCHEMA = [
  CREATE_PAPERS_TABLE,
  CREATE_PAPER_SECTIONS_TABLE,
  CREATE_PAPER_SECTIONS_INDEX,
] as const;

/** Query-side indexes and the overview view, applied by `npm run migrate`. */
export const REPORTING_SCHEMA = [
  `CREATE INDEX IF NOT EXISTS idx_papers_created_at ON papers(created_at DESC)`,
  `CREATE INDEX IF NOT EXISTS idx_papers_authors ON papers USING GIN(authors)`,
  `CREATE INDEX IF NOT EXISTS idx_papers_keywords ON papers USING GIN(keywords)`,
  `CREATE INDEX IF NOT EXISTS idx_papers_title_fts ON papers USING GIN(to_tsvector('english', title))`,
  `CREATE INDEX IF NOT EXISTS idx_sections_summary_fts ON paper_sections USING GIN(to_tsvector('english', summary))`,
  `CREATE OR REPLACE VIEW paper_overview AS
SELECT
    p.id,
    p.title,
    p.authors,
    array_length(p.authors, 1) AS author_count,
    p.keywords,
    array_length(p.keywords, 1) AS keyword_count,
    COUNT(ps.id) AS section_count,
    p.created_at
FROM papers p
LEFT JOIN paper_sections ps ON p.id = ps.paper_id
GROUP BY p.id, p.title, p.authors, p.keywords, p.created_at`,
] as const;

export const INSERT_PAPER = `
INSERT INTO papers (title, authors, abstract, keywords, pdf_url, outline)
VALUES ($1, $2, $3, $4, $5, $6)
RETURNING id`;

export const INSERT_PAPER_SECTION = `
INSERT INTO paper_sections
(paper_id, section_title, section_description, subsections,
 summary, key_points, methodologies, results, figures_and_tables, citations)
VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`;

export const SELECT_PAPER_BY_ID = `
SELECT id, title, authors, abstract, keywords, pdf_url, outline, created_at
FROM papers
WHERE id = $1`;

export const SELECT_PAPER_SECTIONS = `
SELECT id, paper_id, section_title, section_description, subsections,
       summary, key_points, methodologies, results, figures_and_tables,
       citations, created_at
FROM paper_sections
WHERE paper_id = $1
ORDER BY id`;

export const SELECT_PAPER_OVERVIEW = `
SELECT p.id, p.title, p.authors, p.keywords,
       COUNT(ps.id)::int AS section_count,
       p.created_at
FROM papers p
LEFT JOIN paper_sections ps ON p.id = ps.paper_id
GROUP BY p.id
ORDER BY p.created_at DESC, p.id DESC
LIMIT $1`;
