import type { Schema } from '@google/generative-ai';
import type { PdfDocument } from '../ingest/pdf/download';

export type RemoteFileState = 'pending' | 'ready' | 'failed';

/** Handle to a document uploaded to the extraction backend. */
export interface RemoteFile {
  name: string;
  uri: string;
  mimeType: string;
  state: RemoteFileState;
  error?: string;
}

export interface GenerateRequest {
  file: RemoteFile;
  prompt: string;
  responseSchema: Schema;
  /** Aborted when the caller stops waiting for the response. */
  signal?: AbortSignal;
}

export interface ExtractionBackend {
  uploadFile(document: PdfDocument): Promise<RemoteFile>;
  getFile(name: string): Promise<RemoteFile>;
  deleteFile(name: string): Promise<void>;
  /** Returns the raw JSON text produced for `responseSchema`. */
  generate(request: GenerateRequest): Promise<string>;
}
