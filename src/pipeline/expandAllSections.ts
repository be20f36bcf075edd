import type { Outline, SectionExpansion } from '../agents/schemas';
import { mapParallel } from '../utils/fanOut';
import { createConsoleLogger } from '../utils/logger';
import { expandSection } from './expandSection';
import type { SectionTask, StageDeps } from './types';

const defaultLogger = createConsoleLogger('FanOut');

export function buildSectionTasks(outline: Outline): SectionTask[] {
  return outline.sections.map((section) => ({
    pdf_url: outline.pdf_url,
    title: section.title,
    description: section.description ?? '',
  }));
}

export function findDuplicateTitles(outline: Outline): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const section of outline.sections) {
    if (seen.has(section.title)) {
      duplicates.add(section.title);
    }
    seen.add(section.title);
  }
  return Array.from(duplicates);
}

/**
 * Fan-out coordinator: expands every section concurrently and returns the
 * expansions in outline order. The first failed expansion fails the call.
 */
export async function expandAllSections(
  outline: Outline,
  deps: StageDeps
): Promise<SectionExpansion[]> {
  const logger = deps.logger ?? defaultLogger;
  const tasks = buildSectionTasks(outline);

  const duplicates = findDuplicateTitles(outline);
  if (duplicates.length > 0) {
    logger.warn('Outline repeats section titles; only one expansion per title will be stored', {
      duplicates,
    });
  }

  logger.info(
    `Expanding ${tasks.length} sections (concurrency ${deps.settings.fanoutConcurrency})`
  );

  return mapParallel(tasks, (task) => expandSection(task, deps), {
    concurrency: deps.settings.fanoutConcurrency,
  });
}
