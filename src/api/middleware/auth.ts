import type { FastifyReply, FastifyRequest } from 'fastify';
import { createError } from './errorHandler';

function bearerToken(request: FastifyRequest): string | undefined {
  const header = request.headers.authorization;
  if (!header) return undefined;
  const [scheme, token] = header.split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token : undefined;
}

/**
 * Requires `Authorization: Bearer <apiKey>`. With no key configured the
 * check is skipped, which is how local development runs.
 */
export function requireApiKey(apiKey: string | undefined) {
  return async function checkApiKey(request: FastifyRequest, _reply: FastifyReply): Promise<void> {
    if (!apiKey) {
      return;
    }

    if (bearerToken(request) !== apiKey) {
      throw createError('Invalid or missing API key', 401, 'INVALID_API_KEY');
    }
  };
}
