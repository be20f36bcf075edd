#!/usr/bin/env node
import 'dotenv/config';
import { GeminiBackend } from './agents/geminiBackend';
import { loadConfig, type AppConfig } from './config/appConfig';
import { createDatabaseClient } from './db/client';
import { HttpDocumentSource } from './ingest/pdf/download';
import { processPaper } from './pipeline/runPipeline';
import { LaneLimiter } from './utils/limiter';
import { createConsoleLogger } from './utils/logger';

async function main(): Promise<void> {
  const pdfUrl = process.argv[2];

  if (!pdfUrl) {
    console.error('Usage: npm run dev <pdf-url>');
    console.error('Example: npm run dev https://example.org/papers/sample.pdf');
    process.exit(1);
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const logger = createConsoleLogger('Pipeline');
  const limiter = new LaneLimiter({
    gemini_llm: config.concurrency.geminiLlm,
    pdf_download: config.concurrency.pdfDownload,
  });
  const db = createDatabaseClient(config.databaseUrl, logger);

  console.log(`Processing paper from: ${pdfUrl}`);
  console.log('This may take several minutes...\n');

  try {
    const result = await processPaper(pdfUrl, {
      backend: new GeminiBackend({
        apiKey: config.geminiApiKey,
        model: config.stages.model,
        maxOutputTokens: config.stages.maxOutputTokens,
      }),
      documents: new HttpDocumentSource({
        timeoutMs: config.stages.downloadTimeoutMs,
        limiter,
        logger,
      }),
      db,
      settings: config.stages,
      limiter,
      logger,
    });

    console.log('Pipeline completed successfully!');
    console.log(JSON.stringify(result, null, 2));
  } catch (error) {
    console.error('Pipeline failed:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  } finally {
    await db.close();
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}

export { processPaper } from './pipeline/runPipeline';
export { createOutline } from './pipeline/createOutline';
export { expandSection } from './pipeline/expandSection';
export { expandAllSections } from './pipeline/expandAllSections';
export { writeToPostgres } from './pipeline/writeToPostgres';
export { RequestTracker } from './pipeline/requestTracker';
export { createDatabaseClient, DatabaseClient } from './db/client';
export { GeminiBackend } from './agents/geminiBackend';
export { HttpDocumentSource } from './ingest/pdf/download';
export { loadConfig } from './config/appConfig';
export * from './agents/errors';
export * from './agents/schemas';
export * from './pipeline/types';
