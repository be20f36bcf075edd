import { RetrievalError } from '../../agents/errors';
import { LaneLimiter } from '../../utils/limiter';
import { silentLogger, type Logger } from '../../utils/logger';

export interface PdfDocument {
  url: string;
  fileName: string;
  mimeType: 'application/pdf';
  content: Buffer;
}

export interface DocumentSource {
  fetchDocument(url: string): Promise<PdfDocument>;
}

export interface HttpDocumentSourceOptions {
  timeoutMs: number;
  limiter?: LaneLimiter;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

export function fileNameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url;
  }
  const last = pathname.split('/').filter(Boolean).pop() ?? 'paper';
  const safeName = last.replace(/[^a-zA-Z0-9._-]/g, '_');
  return safeName.toLowerCase().endsWith('.pdf') ? safeName : `${safeName}.pdf`;
}

/**
 * Plain HTTP GET of a PDF. Every call downloads again; nothing is cached
 * between stages.
 */
export class HttpDocumentSource implements DocumentSource {
  private readonly limiter: LaneLimiter;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(private readonly options: HttpDocumentSourceOptions) {
    this.limiter = options.limiter ?? new LaneLimiter();
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? silentLogger;
  }

  async fetchDocument(url: string): Promise<PdfDocument> {
    return this.limiter.limit('pdf_download', async () => {
      let res: Response;
      try {
        res = await this.fetchImpl(url, {
          signal: AbortSignal.timeout(this.options.timeoutMs),
        });
      } catch (error) {
        throw new RetrievalError(
          url,
          error instanceof Error ? error.message : String(error),
          undefined,
          { cause: error }
        );
      }

      if (!res.ok) {
        throw new RetrievalError(url, `HTTP ${res.status}`, res.status);
      }

      const contentType = res.headers.get('content-type') || '';
      if (contentType && !contentType.toLowerCase().includes('pdf')) {
        this.logger.warn('Response is not labelled as a PDF', { url, contentType });
      }

      let content: Buffer;
      try {
        content = Buffer.from(await res.arrayBuffer());
      } catch (error) {
        throw new RetrievalError(url, 'failed to read response body', res.status, {
          cause: error,
        });
      }

      if (content.length === 0) {
        throw new RetrievalError(url, 'empty response body', res.status);
      }

      return {
        url,
        fileName: fileNameFromUrl(url),
        mimeType: 'application/pdf',
        content,
      };
    });
  }
}
