import { z } from 'zod';
import type { LaneLimiter } from '../utils/limiter';
import { silentLogger, type Logger } from '../utils/logger';
import type { ExtractionBackend, RemoteFile } from './backend';
import { ExtractionFailure, SchemaValidationError, TimeoutError } from './errors';
import { toResponseSchema } from './responseSchema';

export interface AgentRequest<T> {
  agentName: string;
  file: RemoteFile;
  prompt: string;
  schema: z.ZodType<T>;
}

export interface AgentOptions {
  timeoutMs: number;
  logger?: Logger;
  /** Caps concurrent calls in the `gemini_llm` lane; time spent queued is not timed. */
  limiter?: LaneLimiter;
}

async function withTimeout<T>(
  agentName: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutHandle: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new TimeoutError(agentName, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), timeoutPromise]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

/**
 * Asks the backend for JSON shaped by `schema` about an uploaded document
 * and validates the answer. Single attempt: any failure surfaces as an
 * `ExtractionFailure`.
 */
export async function runAgent<T>(
  backend: ExtractionBackend,
  request: AgentRequest<T>,
  options: AgentOptions
): Promise<T> {
  const { agentName, file, prompt, schema } = request;
  const logger = options.logger ?? silentLogger;
  const startedAt = Date.now();

  const responseSchema = toResponseSchema(schema);
  const generate = () =>
    withTimeout(agentName, options.timeoutMs, (signal) =>
      backend.generate({ file, prompt, responseSchema, signal })
    );

  let responseText: string;
  try {
    responseText = await (options.limiter
      ? options.limiter.limit('gemini_llm', generate)
      : generate());
  } catch (error) {
    if (error instanceof ExtractionFailure) {
      throw error;
    }
    throw new ExtractionFailure(
      agentName,
      `backend request failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (!responseText) {
    throw new ExtractionFailure(agentName, 'no text content in backend response');
  }

  logger.info(`[${agentName}] Response length: ${responseText.length} chars`, {
    durationMs: Date.now() - startedAt,
  });

  let jsonData: unknown;
  try {
    jsonData = JSON.parse(responseText);
  } catch (parseError) {
    logger.warn(`[${agentName}] Raw response:`, {
      preview: responseText.length > 2000 ? `${responseText.substring(0, 2000)}...` : responseText,
    });
    throw new ExtractionFailure(
      agentName,
      `failed to parse JSON from response: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
      { cause: parseError }
    );
  }

  const validationResult = schema.safeParse(jsonData);
  if (!validationResult.success) {
    logger.warn(`[${agentName}] Schema validation failed`, {
      errors: validationResult.error.issues,
    });
    throw new SchemaValidationError(agentName, validationResult.error);
  }

  return validationResult.data;
}
