import type { Outline, SectionExpansion } from '../agents/schemas';
import type { DatabaseClient, InsertPaper, InsertPaperSection } from '../db/client';
import { createConsoleLogger, type Logger } from '../utils/logger';
import type { PersistenceSummary } from './types';

const defaultLogger = createConsoleLogger('Persistence');

export function buildPaperRow(outline: Outline): InsertPaper {
  return {
    title: outline.title,
    authors: outline.authors ?? [],
    abstract: outline.abstract ?? '',
    keywords: outline.keywords ?? [],
    pdf_url: outline.pdf_url,
    outline,
  };
}

/**
 * One row per outline section, in outline order. Expansions are joined by
 * section title; a title repeated across expansions keeps the last one, and
 * a section without an expansion gets empty fields.
 */
export function buildSectionRows(
  outline: Outline,
  expansions: SectionExpansion[]
): InsertPaperSection[] {
  const expandedByTitle = new Map<string, SectionExpansion>();
  for (const expansion of expansions) {
    expandedByTitle.set(expansion.section_title, expansion);
  }

  return outline.sections.map((section) => {
    const expanded = expandedByTitle.get(section.title);
    return {
      section_title: section.title,
      section_description: section.description ?? '',
      subsections: section.subsections ?? [],
      summary: expanded?.summary ?? '',
      key_points: expanded?.key_points ?? [],
      methodologies: expanded?.methodologies ?? [],
      results: expanded?.results ?? [],
      figures_and_tables: expanded?.figures_and_tables ?? [],
      citations: expanded?.citations ?? [],
    };
  });
}

/**
 * Persistence stage: makes sure the tables exist, then writes the paper and
 * all of its sections in one transaction.
 */
export async function writeToPostgres(
  outline: Outline,
  expansions: SectionExpansion[],
  db: DatabaseClient,
  logger: Logger = defaultLogger
): Promise<PersistenceSummary> {
  await db.ensureSchema();

  const paper = buildPaperRow(outline);
  const sections = buildSectionRows(outline, expansions);

  const expandedTitles = new Set(expansions.map((expansion) => expansion.section_title));
  const unmatched = outline.sections.filter((section) => !expandedTitles.has(section.title));
  if (unmatched.length > 0) {
    logger.warn(`${unmatched.length} sections have no expansion data`, {
      sections: unmatched.map((section) => section.title),
    });
  }

  const paperId = await db.insertPaperWithSections(paper, sections);
  logger.info(`Stored paper ${paperId} with ${sections.length} sections`, {
    title: outline.title,
  });

  return {
    paper_id: paperId,
    status: 'success',
    title: outline.title,
    sections_written: sections.length,
    total_authors: paper.authors.length,
    total_keywords: paper.keywords.length,
  };
}
