import { OUTLINE_PROMPT } from '../agents/prompts';
import { runAgent } from '../agents/runAgent';
import { PaperOutlineSchema, type Outline } from '../agents/schemas';
import { withUploadedDocument } from '../agents/uploadedDocument';
import { createConsoleLogger } from '../utils/logger';
import type { StageDeps } from './types';

const defaultLogger = createConsoleLogger('Outline');

/**
 * Extraction stage: downloads the PDF, has the backend extract the outline
 * and returns it with `pdf_url` attached for the later stages.
 */
export async function createOutline(pdfUrl: string, deps: StageDeps): Promise<Outline> {
  const logger = deps.logger ?? defaultLogger;
  const { settings } = deps;

  const document = await deps.documents.fetchDocument(pdfUrl);
  logger.info(`Downloaded ${document.content.length} bytes`, { pdfUrl });

  const outline = await withUploadedDocument(
    deps.backend,
    document,
    {
      stage: 'Outline',
      pollIntervalMs: settings.pollIntervalMs,
      fileProcessingTimeoutMs: settings.fileProcessingTimeoutMs,
      logger,
    },
    (file) =>
      runAgent(
        deps.backend,
        { agentName: 'Outline', file, prompt: OUTLINE_PROMPT, schema: PaperOutlineSchema },
        { timeoutMs: settings.generationTimeoutMs, limiter: deps.limiter, logger }
      )
  );

  if (outline.sections.length === 0) {
    logger.warn('Outline has no sections', { pdfUrl, title: outline.title });
  }
  logger.info(`Extracted outline with ${outline.sections.length} sections`, {
    title: outline.title,
  });

  return { ...outline, pdf_url: pdfUrl };
}
