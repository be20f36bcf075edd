import { v4 as uuidv4 } from 'uuid';
import { createConsoleLogger, type Logger } from '../utils/logger';
import type { PersistenceSummary, PipelineStage } from './types';

export type RequestState = 'pending' | 'completed' | 'failed';

export interface RequestStatus {
  request_id: string;
  pdf_url: string;
  status: RequestState;
  stage?: PipelineStage;
  output?: PersistenceSummary;
  error?: string;
  created_at: string;
  finished_at?: string;
}

export type PaperRunner = (
  pdfUrl: string,
  onStageChange: (stage: PipelineStage) => void
) => Promise<PersistenceSummary>;

export interface RequestTrackerOptions {
  /** Finished requests beyond this many are forgotten, oldest first. */
  maxEntries?: number;
}

const defaultLogger = createConsoleLogger('Requests');

/**
 * In-memory record of asynchronous pipeline runs, polled by request id.
 * Pending requests are always kept; finished ones are evicted oldest first
 * once more than `maxEntries` are tracked.
 */
export class RequestTracker {
  private readonly requests = new Map<string, RequestStatus>();
  private readonly runs = new Map<string, Promise<void>>();
  private readonly maxEntries: number;

  constructor(
    private readonly runPaper: PaperRunner,
    private readonly logger: Logger = defaultLogger,
    options: RequestTrackerOptions = {}
  ) {
    this.maxEntries = options.maxEntries ?? 1000;
  }

  submit(pdfUrl: string): RequestStatus {
    const requestId = uuidv4();
    const request: RequestStatus = {
      request_id: requestId,
      pdf_url: pdfUrl,
      status: 'pending',
      created_at: new Date().toISOString(),
    };
    this.requests.set(requestId, request);
    this.evictFinished();

    const run = this.execute(request).catch((error) => {
      this.logger.error(`Request ${requestId} bookkeeping failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
    });
    this.runs.set(requestId, run);

    return { ...request };
  }

  get(requestId: string): RequestStatus | undefined {
    const request = this.requests.get(requestId);
    return request ? { ...request } : undefined;
  }

  /** Resolves once the run for `requestId` has finished, either way. */
  async settled(requestId: string): Promise<RequestStatus | undefined> {
    await this.runs.get(requestId);
    return this.get(requestId);
  }

  private evictFinished(): void {
    for (const [requestId, request] of this.requests) {
      if (this.requests.size <= this.maxEntries) {
        return;
      }
      if (request.status !== 'pending') {
        this.requests.delete(requestId);
      }
    }
  }

  private async execute(request: RequestStatus): Promise<void> {
    try {
      request.output = await this.runPaper(request.pdf_url, (stage) => {
        request.stage = stage;
      });
      request.status = 'completed';
      this.logger.info(`Request ${request.request_id} completed`, {
        paperId: request.output.paper_id,
      });
    } catch (error) {
      request.status = 'failed';
      request.error = error instanceof Error ? error.message : 'Unknown error occurred';
      this.logger.warn(`Request ${request.request_id} failed`, { error: request.error });
    } finally {
      request.finished_at = new Date().toISOString();
      this.runs.delete(request.request_id);
    }
  }
}
