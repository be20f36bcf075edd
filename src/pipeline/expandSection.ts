import { buildSectionExpansionPrompt } from '../agents/prompts';
import { runAgent } from '../agents/runAgent';
import { SectionExpansionSchema, type SectionExpansion } from '../agents/schemas';
import { withUploadedDocument } from '../agents/uploadedDocument';
import { createConsoleLogger } from '../utils/logger';
import type { SectionTask, StageDeps } from './types';

const defaultLogger = createConsoleLogger('SectionExpansion');

/**
 * Expansion stage for a single section. Depends only on `task`: the PDF is
 * downloaded and uploaded again for every call, so concurrent calls share
 * no state.
 */
export async function expandSection(
  task: SectionTask,
  deps: StageDeps
): Promise<SectionExpansion> {
  const logger = deps.logger ?? defaultLogger;
  const { settings } = deps;

  const document = await deps.documents.fetchDocument(task.pdf_url);

  const expansion = await withUploadedDocument(
    deps.backend,
    document,
    {
      stage: 'SectionExpansion',
      pollIntervalMs: settings.pollIntervalMs,
      fileProcessingTimeoutMs: settings.fileProcessingTimeoutMs,
      logger,
    },
    (file) =>
      runAgent(
        deps.backend,
        {
          agentName: 'SectionExpansion',
          file,
          prompt: buildSectionExpansionPrompt({
            title: task.title,
            description: task.description,
          }),
          schema: SectionExpansionSchema,
        },
        { timeoutMs: settings.generationTimeoutMs, limiter: deps.limiter, logger }
      )
  );

  if (expansion.section_title !== task.title) {
    // persistence joins on the title, so this expansion will not attach
    logger.warn('Expansion returned a different section title', {
      requested: task.title,
      returned: expansion.section_title,
    });
  }

  logger.info(`Expanded "${task.title}" (${expansion.key_points.length} key points)`);
  return expansion;
}
