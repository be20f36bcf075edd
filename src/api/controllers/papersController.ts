import type { FastifyReply, FastifyRequest } from 'fastify';
import type { PapersService } from '../services/papersService';
import { createError } from '../middleware/errorHandler';
import type { PaperDetailResponse, PaperListResponse } from '../types/api';

interface PapersQuerystring {
  limit?: string;
}

interface PaperParams {
  paperId: string;
}

const MAX_LIMIT = 200;
// papers.id is a SERIAL (int4) column
const MAX_PAPER_ID = 2147483647;

export class PapersController {
  constructor(private papersService: PapersService) {}

  async getAll(
    request: FastifyRequest<{ Querystring: PapersQuerystring }>,
    reply: FastifyReply
  ) {
    const limit = request.query.limit ? parseInt(request.query.limit, 10) : 50;
    if (!Number.isInteger(limit) || limit < 1) {
      throw createError('limit must be a positive integer', 400, 'INVALID_LIMIT');
    }

    const papers = await this.papersService.listPapers(Math.min(limit, MAX_LIMIT));
    const body: PaperListResponse = { data: papers };
    reply.send(body);
  }

  async getById(
    request: FastifyRequest<{ Params: PaperParams }>,
    reply: FastifyReply
  ) {
    const paperId = Number(request.params.paperId);
    if (!Number.isInteger(paperId) || paperId < 1 || paperId > MAX_PAPER_ID) {
      throw createError('paperId must be a positive integer', 400, 'INVALID_PAPER_ID');
    }

    const result = await this.papersService.getPaperWithSections(paperId);
    if (!result) {
      throw createError('Paper not found', 404, 'PAPER_NOT_FOUND');
    }

    const body: PaperDetailResponse = { data: result };
    reply.send(body);
  }
}
