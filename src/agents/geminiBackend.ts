import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import {
  FileState,
  GoogleAIFileManager,
  type FileMetadataResponse,
} from '@google/generative-ai/server';
import type { PdfDocument } from '../ingest/pdf/download';
import type {
  ExtractionBackend,
  GenerateRequest,
  RemoteFile,
  RemoteFileState,
} from './backend';

export interface GeminiBackendOptions {
  apiKey: string;
  model: string;
  maxOutputTokens: number;
}

function toRemoteState(state: FileState): RemoteFileState {
  switch (state) {
    case FileState.ACTIVE:
      return 'ready';
    case FileState.FAILED:
      return 'failed';
    default:
      return 'pending';
  }
}

function toRemoteFile(file: FileMetadataResponse): RemoteFile {
  return {
    name: file.name,
    uri: file.uri,
    mimeType: file.mimeType,
    state: toRemoteState(file.state),
    error: file.error?.message,
  };
}

/**
 * Gemini File API + structured generation. The SDK uploads from a path, so
 * each document is staged in its own temp directory for the duration of the
 * upload only.
 */
export class GeminiBackend implements ExtractionBackend {
  private readonly fileManager: GoogleAIFileManager;
  private readonly model: GenerativeModel;

  constructor(private readonly options: GeminiBackendOptions) {
    this.fileManager = new GoogleAIFileManager(options.apiKey);
    this.model = new GoogleGenerativeAI(options.apiKey).getGenerativeModel({
      model: options.model,
    });
  }

  async uploadFile(document: PdfDocument): Promise<RemoteFile> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'paper-outline-'));
    const filePath = path.join(dir, document.fileName);
    try {
      await fs.writeFile(filePath, document.content);
      const response = await this.fileManager.uploadFile(filePath, {
        mimeType: document.mimeType,
        displayName: document.fileName,
      });
      return toRemoteFile(response.file);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  async getFile(name: string): Promise<RemoteFile> {
    return toRemoteFile(await this.fileManager.getFile(name));
  }

  async deleteFile(name: string): Promise<void> {
    await this.fileManager.deleteFile(name);
  }

  async generate({ file, prompt, responseSchema, signal }: GenerateRequest): Promise<string> {
    const result = await this.model.generateContent(
      {
        contents: [
          {
            role: 'user',
            parts: [
              { fileData: { mimeType: file.mimeType, fileUri: file.uri } },
              { text: prompt },
            ],
          },
        ],
        generationConfig: {
          temperature: 0.0,
          maxOutputTokens: this.options.maxOutputTokens,
          responseMimeType: 'application/json',
          responseSchema,
        },
      },
      { signal }
    );
    return result.response.text();
  }
}
