import 'dotenv/config';
import { z } from 'zod';

const SubmitResponseSchema = z.object({
  data: z.object({ request_id: z.string(), status: z.string() }),
});

const StatusResponseSchema = z.object({
  data: z.object({
    request_id: z.string(),
    status: z.enum(['pending', 'completed', 'failed']),
    stage: z.string().optional(),
    error: z.string().optional(),
    output: z
      .object({
        paper_id: z.number(),
        status: z.string(),
        title: z.string(),
        sections_written: z.number(),
        total_authors: z.number(),
        total_keywords: z.number(),
      })
      .optional(),
  }),
});

type RunOutput = NonNullable<z.infer<typeof StatusResponseSchema>['data']['output']>;

const API_URL = process.env.PAPER_API_URL || 'http://localhost:3000';
const API_KEY = process.env.API_KEY || '';
const POLL_INTERVAL_MS = 10_000;
const MAX_WAIT_MS = 30 * 60 * 1000;

function authHeaders(): Record<string, string> {
  return API_KEY ? { Authorization: `Bearer ${API_KEY}` } : {};
}

async function submitPaper(pdfUrl: string): Promise<string> {
  const res = await fetch(`${API_URL}/api/papers/process`, {
    method: 'POST',
    headers: { 'content-type': 'application/json', ...authHeaders() },
    body: JSON.stringify({ pdf_url: pdfUrl }),
  });
  if (!res.ok) {
    throw new Error(`Submit failed: HTTP ${res.status} ${await res.text()}`);
  }
  const { data } = SubmitResponseSchema.parse(await res.json());
  console.log(`Submitted paper processing request: ${data.request_id}`);
  return data.request_id;
}

async function waitForCompletion(requestId: string): Promise<RunOutput> {
  const startedAt = Date.now();

  while (Date.now() - startedAt < MAX_WAIT_MS) {
    const res = await fetch(`${API_URL}/api/requests/${encodeURIComponent(requestId)}`, {
      headers: authHeaders(),
    });
    if (!res.ok) {
      throw new Error(`Status check failed: HTTP ${res.status}`);
    }
    const { data } = StatusResponseSchema.parse(await res.json());
    console.log(`Status: ${data.status}${data.stage ? ` (${data.stage})` : ''}`);

    if (data.status === 'completed' && data.output) {
      return data.output;
    }
    if (data.status === 'failed') {
      throw new Error(`Processing failed: ${data.error ?? 'Unknown error'}`);
    }

    await new Promise((resolve) => setTimeout(resolve, POLL_INTERVAL_MS));
  }

  throw new Error(`Request did not complete within ${MAX_WAIT_MS / 1000} seconds`);
}

async function main(): Promise<void> {
  const pdfUrl = process.argv[2];
  if (!pdfUrl) {
    console.error('Usage: npm run submit <pdf-url>');
    process.exit(1);
  }

  const requestId = await submitPaper(pdfUrl);
  console.log('Waiting for processing to complete...');
  const result = await waitForCompletion(requestId);

  console.log('\nProcessing Results:');
  console.log('-'.repeat(80));
  console.log(`Paper ID: ${result.paper_id}`);
  console.log(`Title: ${result.title}`);
  console.log(`Status: ${result.status}`);
  console.log(`Sections Written: ${result.sections_written}`);
  console.log(`Total Authors: ${result.total_authors}`);
  console.log(`Total Keywords: ${result.total_keywords}`);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
