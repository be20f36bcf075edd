import type { FastifyInstance } from 'fastify';
import { PapersController } from '../controllers/papersController';
import { requireApiKey } from '../middleware';
import { PapersService, type PapersStore } from '../services/papersService';

export function registerPapersRoutes(
  fastify: FastifyInstance,
  db: PapersStore,
  apiKey: string | undefined
) {
  const controller = new PapersController(new PapersService(db));
  const checkApiKey = requireApiKey(apiKey);

  // GET /api/papers
  fastify.get<{ Querystring: { limit?: string } }>(
    '/api/papers',
    { preHandler: checkApiKey },
    async (request, reply) => {
      await controller.getAll(request, reply);
    }
  );

  // GET /api/papers/:paperId
  fastify.get<{ Params: { paperId: string } }>(
    '/api/papers/:paperId',
    { preHandler: checkApiKey },
    async (request, reply) => {
      await controller.getById(request, reply);
    }
  );
}
