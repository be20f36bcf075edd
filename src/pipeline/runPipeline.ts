import { createConsoleLogger } from '../utils/logger';
import { createOutline } from './createOutline';
import { expandAllSections } from './expandAllSections';
import type { PersistenceSummary, PipelineDeps, PipelineStage } from './types';
import { writeToPostgres } from './writeToPostgres';

const defaultLogger = createConsoleLogger('Pipeline');

/**
 * Outline, expand, persist, strictly in that order. A failure in any stage
 * ends the run and propagates unchanged; nothing is retried.
 */
export async function processPaper(
  pdfUrl: string,
  deps: PipelineDeps
): Promise<PersistenceSummary> {
  const logger = deps.logger ?? defaultLogger;
  const startTime = Date.now();

  const enter = (stage: PipelineStage) => {
    logger.info(`Stage: ${stage}`, { pdfUrl });
    deps.onStageChange?.(stage);
  };

  logger.info(`Processing paper from ${pdfUrl}`);

  enter('outlining');
  const outline = await createOutline(pdfUrl, deps);

  enter('expanding');
  const expansions = await expandAllSections(outline, deps);

  enter('persisting');
  const summary = await writeToPostgres(outline, expansions, deps.db, logger);

  logger.info(`Completed in ${Date.now() - startTime}ms`, {
    paperId: summary.paper_id,
    sections: summary.sections_written,
  });
  return summary;
}
