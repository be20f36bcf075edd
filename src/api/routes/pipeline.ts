import type { FastifyInstance } from 'fastify';
import type { RequestTracker } from '../../pipeline/requestTracker';
import { PipelineController, type RequestParams } from '../controllers/pipelineController';
import { requireApiKey } from '../middleware';

export function registerPipelineRoutes(
  fastify: FastifyInstance,
  tracker: RequestTracker,
  apiKey: string | undefined
) {
  const controller = new PipelineController(tracker);
  const checkApiKey = requireApiKey(apiKey);

  // POST /api/papers/process - submit a PDF URL for asynchronous processing
  fastify.post<{ Body: unknown }>(
    '/api/papers/process',
    { preHandler: checkApiKey },
    async (request, reply) => {
      await controller.process(request, reply);
    }
  );

  // GET /api/requests/:requestId - poll a submitted run
  fastify.get<{ Params: RequestParams }>(
    '/api/requests/:requestId',
    { preHandler: checkApiKey },
    async (request, reply) => {
      await controller.getStatus(request, reply);
    }
  );
}
