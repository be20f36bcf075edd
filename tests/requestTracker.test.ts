import { describe, it, expect } from '@jest/globals';
import { RequestTracker, type PaperRunner } from '../src/pipeline/requestTracker';
import type { PersistenceSummary } from '../src/pipeline/types';
import { recordingLogger } from './utils/fakeBackend';

const PDF_URL = 'https://papers.example.test/attention.pdf';

const summary: PersistenceSummary = {
  paper_id: 7,
  status: 'success',
  title: 'Attention Is All You Need',
  sections_written: 2,
  total_authors: 2,
  total_keywords: 1,
};

describe('RequestTracker', () => {
  it('reports a new request as pending', () => {
    const tracker = new RequestTracker(() => new Promise<PersistenceSummary>(() => undefined), recordingLogger());

    const submitted = tracker.submit(PDF_URL);

    expect(submitted.status).toBe('pending');
    expect(submitted.pdf_url).toBe(PDF_URL);
    expect(submitted.request_id).toMatch(/^[0-9a-f-]{36}$/);
    expect(tracker.get(submitted.request_id)?.status).toBe('pending');
  });

  it('records the summary of a completed run', async () => {
    const runner: PaperRunner = async (_pdfUrl, onStageChange) => {
      onStageChange('outlining');
      onStageChange('expanding');
      onStageChange('persisting');
      return summary;
    };
    const tracker = new RequestTracker(runner, recordingLogger());

    const { request_id } = tracker.submit(PDF_URL);
    const settled = await tracker.settled(request_id);

    expect(settled?.status).toBe('completed');
    expect(settled?.stage).toBe('persisting');
    expect(settled?.output).toEqual(summary);
    expect(settled?.error).toBeUndefined();
    expect(settled?.finished_at).toBeDefined();
  });

  it('records the error message of a failed run and the stage it stopped in', async () => {
    const tracker = new RequestTracker(async (_pdfUrl, onStageChange) => {
      onStageChange('outlining');
      throw new Error('Outline extraction failed: timed out after 20ms');
    }, recordingLogger());

    const { request_id } = tracker.submit(PDF_URL);
    const settled = await tracker.settled(request_id);

    expect(settled?.status).toBe('failed');
    expect(settled?.stage).toBe('outlining');
    expect(settled?.error).toBe('Outline extraction failed: timed out after 20ms');
    expect(settled?.output).toBeUndefined();
  });

  it('uses a generic message when something other than an Error is thrown', async () => {
    const tracker = new RequestTracker(() => Promise.reject('boom'), recordingLogger());

    const { request_id } = tracker.submit(PDF_URL);

    await expect(tracker.settled(request_id)).resolves.toMatchObject({
      status: 'failed',
      error: 'Unknown error occurred',
    });
  });

  it('returns undefined for an unknown request', async () => {
    const tracker = new RequestTracker(async () => summary, recordingLogger());

    expect(tracker.get('missing')).toBeUndefined();
    await expect(tracker.settled('missing')).resolves.toBeUndefined();
  });

  it('hands out copies, not the live record', async () => {
    const tracker = new RequestTracker(async () => summary, recordingLogger());

    const submitted = tracker.submit(PDF_URL);
    await tracker.settled(submitted.request_id);

    expect(submitted.status).toBe('pending');
    expect(tracker.get(submitted.request_id)?.status).toBe('completed');
  });

  it('forgets the oldest finished requests beyond maxEntries', async () => {
    const tracker = new RequestTracker(async () => summary, recordingLogger(), { maxEntries: 2 });

    const first = tracker.submit(PDF_URL);
    await tracker.settled(first.request_id);
    const second = tracker.submit(PDF_URL);
    await tracker.settled(second.request_id);
    const third = tracker.submit(PDF_URL);

    expect(tracker.get(first.request_id)).toBeUndefined();
    expect(tracker.get(second.request_id)?.status).toBe('completed');
    expect(tracker.get(third.request_id)?.status).toBe('pending');
  });

  it('never forgets a pending request', () => {
    const tracker = new RequestTracker(
      () => new Promise<PersistenceSummary>(() => undefined),
      recordingLogger(),
      { maxEntries: 1 }
    );

    const first = tracker.submit(PDF_URL);
    const second = tracker.submit(PDF_URL);

    expect(tracker.get(first.request_id)?.status).toBe('pending');
    expect(tracker.get(second.request_id)?.status).toBe('pending');
  });
});
