import { describe, it, expect, jest } from '@jest/globals';
import { RetrievalError } from '../src/agents/errors';
import { fileNameFromUrl, HttpDocumentSource } from '../src/ingest/pdf/download';
import { LaneLimiter } from '../src/utils/limiter';
import { recordingLogger } from './utils/fakeBackend';

const PDF_URL = 'https://papers.example.test/pdf/1706.03762v7.pdf';

function pdfResponse(body: string, contentType = 'application/pdf'): Response {
  return new Response(body, { status: 200, headers: { 'content-type': contentType } });
}

describe('fileNameFromUrl', () => {
  it('keeps the last path segment of a .pdf URL', () => {
    expect(fileNameFromUrl(PDF_URL)).toBe('1706.03762v7.pdf');
  });

  it('appends .pdf to an extensionless path', () => {
    expect(fileNameFromUrl('https://example.test/abs/1706.03762?v=7')).toBe('1706.03762.pdf');
  });

  it('replaces characters unsafe in a file name', () => {
    expect(fileNameFromUrl('https://example.test/files/draft(v2)')).toBe('draft_v2_.pdf');
  });

  it('falls back to a default name for a bare host', () => {
    expect(fileNameFromUrl('https://example.test/')).toBe('paper.pdf');
  });
});

describe('HttpDocumentSource', () => {
  it('returns the response bytes as a PDF document', async () => {
    const fetchImpl = jest.fn<typeof fetch>().mockResolvedValue(pdfResponse('%PDF-1.4 body'));
    const source = new HttpDocumentSource({ timeoutMs: 1000, fetchImpl });

    const document = await source.fetchDocument(PDF_URL);

    expect(document.url).toBe(PDF_URL);
    expect(document.fileName).toBe('1706.03762v7.pdf');
    expect(document.mimeType).toBe('application/pdf');
    expect(document.content.toString()).toBe('%PDF-1.4 body');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  it('downloads again on every call', async () => {
    const fetchImpl = jest
      .fn<typeof fetch>()
      .mockImplementation(async () => pdfResponse('%PDF-1.4 body'));
    const source = new HttpDocumentSource({ timeoutMs: 1000, fetchImpl });

    await source.fetchDocument(PDF_URL);
    await source.fetchDocument(PDF_URL);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it('raises RetrievalError with the status for a non-2xx response', async () => {
    const fetchImpl = jest
      .fn<typeof fetch>()
      .mockResolvedValue(new Response('missing', { status: 404 }));
    const source = new HttpDocumentSource({ timeoutMs: 1000, fetchImpl });

    const error = await source.fetchDocument(PDF_URL).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetrievalError);
    if (error instanceof RetrievalError) {
      expect(error.status).toBe(404);
      expect(error.url).toBe(PDF_URL);
      expect(error.message).toBe(`Failed to retrieve document ${PDF_URL}: HTTP 404`);
    }
  });

  it('wraps network errors in RetrievalError', async () => {
    const fetchImpl = jest.fn<typeof fetch>().mockRejectedValue(new Error('getaddrinfo ENOTFOUND'));
    const source = new HttpDocumentSource({ timeoutMs: 1000, fetchImpl });

    await expect(source.fetchDocument(PDF_URL)).rejects.toThrow(
      `Failed to retrieve document ${PDF_URL}: getaddrinfo ENOTFOUND`
    );
  });

  it('rejects an empty body', async () => {
    const fetchImpl = jest.fn<typeof fetch>().mockResolvedValue(pdfResponse(''));
    const source = new HttpDocumentSource({ timeoutMs: 1000, fetchImpl });

    await expect(source.fetchDocument(PDF_URL)).rejects.toBeInstanceOf(RetrievalError);
  });

  it('warns but proceeds when the content type is not PDF', async () => {
    const logger = recordingLogger();
    const fetchImpl = jest
      .fn<typeof fetch>()
      .mockResolvedValue(pdfResponse('%PDF-1.4 body', 'application/octet-stream'));
    const source = new HttpDocumentSource({ timeoutMs: 1000, fetchImpl, logger });

    const document = await source.fetchDocument(PDF_URL);

    expect(document.content.length).toBe(13);
    expect(logger.entries).toEqual([
      {
        level: 'warn',
        message: 'Response is not labelled as a PDF',
        context: { url: PDF_URL, contentType: 'application/octet-stream' },
      },
    ]);
  });

  it('runs downloads in the pdf_download lane', async () => {
    const limiter = new LaneLimiter({ pdf_download: 1 });
    let peak = 0;
    const fetchImpl = jest.fn<typeof fetch>().mockImplementation(async () => {
      peak = Math.max(peak, limiter.activeCount('pdf_download'));
      await new Promise((resolve) => setTimeout(resolve, 5));
      return pdfResponse('%PDF-1.4 body');
    });
    const source = new HttpDocumentSource({ timeoutMs: 1000, fetchImpl, limiter });

    await Promise.all([source.fetchDocument(PDF_URL), source.fetchDocument(PDF_URL)]);

    expect(peak).toBe(1);
  });
});
