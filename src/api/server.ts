import 'dotenv/config';
import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { GeminiBackend } from '../agents/geminiBackend';
import { loadConfig, type AppConfig } from '../config/appConfig';
import { createDatabaseClient } from '../db/client';
import { HttpDocumentSource } from '../ingest/pdf/download';
import { RequestTracker } from '../pipeline/requestTracker';
import { processPaper } from '../pipeline/runPipeline';
import { LaneLimiter } from '../utils/limiter';
import { createConsoleLogger } from '../utils/logger';
import { errorHandler } from './middleware';
import { registerPapersRoutes, registerPipelineRoutes } from './routes';
import type { PapersStore } from './services/papersService';

export interface ServerDeps {
  tracker: RequestTracker;
  db: PapersStore;
  apiKey?: string;
  corsOrigin?: string;
  logLevel?: string;
  nodeEnv?: string;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: deps.logLevel || 'info',
      transport:
        deps.nodeEnv === 'development'
          ? {
              target: 'pino-pretty',
              options: {
                translateTime: 'HH:MM:ss Z',
                ignore: 'pid,hostname',
              },
            }
          : undefined,
    },
  });

  await fastify.register(cors, {
    origin: deps.corsOrigin || '*',
    credentials: true,
  });

  fastify.setErrorHandler(errorHandler);

  // Health check (no API key required)
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  registerPipelineRoutes(fastify, deps.tracker, deps.apiKey);
  registerPapersRoutes(fastify, deps.db, deps.apiKey);

  return fastify;
}

/** Wires the real Gemini backend, HTTP downloader and PostgreSQL store. */
export function createServerDeps(config: AppConfig): ServerDeps & { close(): Promise<void> } {
  const limiter = new LaneLimiter({
    gemini_llm: config.concurrency.geminiLlm,
    pdf_download: config.concurrency.pdfDownload,
  });
  const logger = createConsoleLogger('Pipeline');
  const db = createDatabaseClient(config.databaseUrl, logger);
  const backend = new GeminiBackend({
    apiKey: config.geminiApiKey,
    model: config.stages.model,
    maxOutputTokens: config.stages.maxOutputTokens,
  });
  const documents = new HttpDocumentSource({
    timeoutMs: config.stages.downloadTimeoutMs,
    limiter,
    logger,
  });

  const tracker = new RequestTracker(
    (pdfUrl, onStageChange) =>
      processPaper(pdfUrl, {
        backend,
        documents,
        db,
        settings: config.stages,
        limiter,
        logger,
        onStageChange,
      }),
    createConsoleLogger('Requests'),
    { maxEntries: config.api.maxTrackedRequests }
  );

  return {
    tracker,
    db,
    apiKey: config.api.apiKey,
    corsOrigin: config.api.corsOrigin,
    logLevel: config.logLevel,
    nodeEnv: config.nodeEnv,
    close: () => db.close(),
  };
}

export async function start(): Promise<void> {
  const config = loadConfig();
  const deps = createServerDeps(config);
  const server = await buildServer(deps);
  server.addHook('onClose', async () => {
    await deps.close();
  });

  await server.listen({ port: config.api.port, host: config.api.host });

  if (config.nodeEnv === 'production' && !config.api.apiKey) {
    server.log.warn('API_KEY is not set; the API accepts unauthenticated requests');
  }
}

if (require.main === module) {
  start().catch((err) => {
    console.error('Error starting server:', err);
    process.exit(1);
  });
}
