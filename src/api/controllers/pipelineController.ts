import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { RequestTracker } from '../../pipeline/requestTracker';
import { createError } from '../middleware/errorHandler';
import type { RequestStatusResponse, SubmitResponse } from '../types/api';

const ProcessBodySchema = z.object({
  pdf_url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'pdf_url must be an http(s) URL'),
});

export type ProcessBody = z.infer<typeof ProcessBodySchema>;

export interface RequestParams {
  requestId: string;
}

export class PipelineController {
  constructor(private readonly tracker: RequestTracker) {}

  async process(
    request: FastifyRequest<{ Body: unknown }>,
    reply: FastifyReply
  ) {
    const parsed = ProcessBodySchema.safeParse(request.body);
    if (!parsed.success) {
      throw createError('pdf_url must be a valid http(s) URL', 400, 'INVALID_PDF_URL');
    }

    const submitted = this.tracker.submit(parsed.data.pdf_url);

    const body: SubmitResponse = {
      data: {
        request_id: submitted.request_id,
        status: submitted.status,
        message: 'Paper processing started',
      },
    };
    reply.status(202).send(body);
  }

  async getStatus(
    request: FastifyRequest<{ Params: RequestParams }>,
    reply: FastifyReply
  ) {
    const { requestId } = request.params;
    const status = this.tracker.get(requestId);

    if (!status) {
      throw createError('Request not found', 404, 'REQUEST_NOT_FOUND');
    }

    const body: RequestStatusResponse = { data: status };
    reply.send(body);
  }
}
