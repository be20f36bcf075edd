import { z } from 'zod';

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  POSTGRES_CONNECTION_STRING: z.string().min(1, 'POSTGRES_CONNECTION_STRING is required'),
  GEMINI_MODEL: z.string().default('gemini-2.5-flash'),
  FILE_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(2000),
  FILE_PROCESSING_TIMEOUT_MS: z.coerce.number().int().positive().default(600000),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(300000),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  MAX_OUTPUT_TOKENS: z.coerce.number().int().positive().default(16000),
  FANOUT_CONCURRENCY: z.coerce.number().int().positive().default(4),
  GEMINI_LLM_CONCURRENCY: z.coerce.number().int().positive().default(4),
  PDF_DOWNLOAD_CONCURRENCY: z.coerce.number().int().positive().default(3),
  API_KEY: z.string().optional(),
  API_PORT: z.coerce.number().int().positive().default(3000),
  API_HOST: z.string().default('0.0.0.0'),
  CORS_ORIGIN: z.string().default('*'),
  MAX_TRACKED_REQUESTS: z.coerce.number().int().positive().default(1000),
  LOG_LEVEL: z.string().default('info'),
  NODE_ENV: z.string().default('development'),
});

export interface StageSettings {
  model: string;
  pollIntervalMs: number;
  fileProcessingTimeoutMs: number;
  generationTimeoutMs: number;
  downloadTimeoutMs: number;
  maxOutputTokens: number;
  fanoutConcurrency: number;
}

export interface AppConfig {
  geminiApiKey: string;
  databaseUrl: string;
  stages: StageSettings;
  concurrency: {
    geminiLlm: number;
    pdfDownload: number;
  };
  api: {
    apiKey?: string;
    port: number;
    host: string;
    corsOrigin: string;
    maxTrackedRequests: number;
  };
  logLevel: string;
  nodeEnv: string;
}

export const DEFAULT_STAGE_SETTINGS: StageSettings = {
  model: 'gemini-2.5-flash',
  pollIntervalMs: 2000,
  fileProcessingTimeoutMs: 600000,
  generationTimeoutMs: 300000,
  downloadTimeoutMs: 30000,
  maxOutputTokens: 16000,
  fanoutConcurrency: 4,
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Builds the explicit configuration passed into every stage. Nothing below
 * the entry points reads `process.env` directly.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `- ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid configuration:\n${issues}`);
  }

  const values = parsed.data;
  // GOOGLE_API_KEY is what the Gemini SDK docs use; accept either
  const geminiApiKey = values.GEMINI_API_KEY || values.GOOGLE_API_KEY;
  if (!geminiApiKey) {
    throw new ConfigError('GEMINI_API_KEY environment variable is not set');
  }

  return {
    geminiApiKey,
    databaseUrl: values.POSTGRES_CONNECTION_STRING,
    stages: {
      model: values.GEMINI_MODEL,
      pollIntervalMs: values.FILE_POLL_INTERVAL_MS,
      fileProcessingTimeoutMs: values.FILE_PROCESSING_TIMEOUT_MS,
      generationTimeoutMs: values.GENERATION_TIMEOUT_MS,
      downloadTimeoutMs: values.DOWNLOAD_TIMEOUT_MS,
      maxOutputTokens: values.MAX_OUTPUT_TOKENS,
      fanoutConcurrency: values.FANOUT_CONCURRENCY,
    },
    concurrency: {
      geminiLlm: values.GEMINI_LLM_CONCURRENCY,
      pdfDownload: values.PDF_DOWNLOAD_CONCURRENCY,
    },
    api: {
      apiKey: values.API_KEY || undefined,
      port: values.API_PORT,
      host: values.API_HOST,
      corsOrigin: values.CORS_ORIGIN,
      maxTrackedRequests: values.MAX_TRACKED_REQUESTS,
    },
    logLevel: values.LOG_LEVEL,
    nodeEnv: values.NODE_ENV,
  };
}
