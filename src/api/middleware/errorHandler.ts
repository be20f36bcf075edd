import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { PersistenceFailure } from '../../agents/errors';
import type { ErrorResponse } from '../types/api';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export function createError(
  message: string,
  statusCode: number = 500,
  code?: string
): ApiError {
  return new ApiError(message, statusCode, code);
}

function classify(error: Error & { statusCode?: number; code?: string }): {
  statusCode: number;
  code: string;
} {
  if (error instanceof PersistenceFailure) {
    return { statusCode: 500, code: 'PERSISTENCE_FAILURE' };
  }
  return {
    statusCode: error.statusCode || 500,
    code: error.code || 'INTERNAL_ERROR',
  };
}

export async function errorHandler(
  error: FastifyError | ApiError,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const { statusCode, code } = classify(error);
  const message = error.message || 'Internal Server Error';

  request.log.error(error, 'Request error');

  const body: ErrorResponse = {
    error: {
      message,
      code,
      statusCode,
    },
  };
  reply.status(statusCode).send(body);
}
