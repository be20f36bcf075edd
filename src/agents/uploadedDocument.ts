import type { PdfDocument } from '../ingest/pdf/download';
import { silentLogger, type Logger } from '../utils/logger';
import type { ExtractionBackend, RemoteFile } from './backend';
import { ExtractionFailure, TimeoutError } from './errors';

export interface UploadOptions {
  stage: string;
  pollIntervalMs: number;
  fileProcessingTimeoutMs: number;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function waitUntilReady(
  backend: ExtractionBackend,
  uploaded: RemoteFile,
  options: UploadOptions
): Promise<RemoteFile> {
  const startedAt = Date.now();
  let file = uploaded;

  while (file.state === 'pending') {
    if (Date.now() - startedAt >= options.fileProcessingTimeoutMs) {
      throw new TimeoutError(options.stage, options.fileProcessingTimeoutMs);
    }
    await sleep(options.pollIntervalMs);
    try {
      file = await backend.getFile(file.name);
    } catch (error) {
      throw new ExtractionFailure(options.stage, `file status check failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  if (file.state === 'failed') {
    const detail = file.error ? `: ${file.error}` : '';
    throw new ExtractionFailure(options.stage, `File processing failed${detail}`);
  }

  return file;
}

/**
 * Uploads `document`, waits for the backend to finish processing it, and
 * hands the ready file to `use`. The remote file is deleted on every exit
 * path once the upload has succeeded.
 */
export async function withUploadedDocument<T>(
  backend: ExtractionBackend,
  document: PdfDocument,
  options: UploadOptions,
  use: (file: RemoteFile) => Promise<T>
): Promise<T> {
  const logger = options.logger ?? silentLogger;

  let uploaded: RemoteFile;
  try {
    uploaded = await backend.uploadFile(document);
  } catch (error) {
    throw new ExtractionFailure(options.stage, `upload failed: ${describeError(error)}`, {
      cause: error,
    });
  }
  logger.info(`[${options.stage}] Uploaded ${document.fileName} as ${uploaded.name}`);

  try {
    const ready = await waitUntilReady(backend, uploaded, options);
    return await use(ready);
  } finally {
    try {
      await backend.deleteFile(uploaded.name);
    } catch (error) {
      // the stage outcome stands; an orphaned file expires on the backend
      logger.warn(`[${options.stage}] Failed to delete uploaded file ${uploaded.name}`, {
        error: describeError(error),
      });
    }
  }
}
