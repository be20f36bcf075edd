import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import type { FastifyInstance } from 'fastify';
import { PersistenceFailure } from '../../agents/errors';
import { createMockData, createTestServer, MockPapersStore } from './utils/testHelpers';

describe('Papers API', () => {
  let server: FastifyInstance;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    const setup = await createTestServer({ store: createMockData() });
    server = setup.server;
    cleanup = setup.cleanup;
  });

  afterEach(async () => {
    await cleanup();
  });

  describe('GET /api/papers', () => {
    it('should list papers newest first with section counts', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/papers',
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.data.map((p: { id: number; section_count: number }) => [p.id, p.section_count])).toEqual([
        [2, 0],
        [1, 1],
      ]);
    });

    it('should honor the limit', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/papers?limit=1',
      });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body).data).toHaveLength(1);
    });

    it('should reject an invalid limit', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/papers?limit=abc',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('INVALID_LIMIT');
    });
  });

  describe('GET /api/papers/:paperId', () => {
    it('should return a paper with its sections', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/papers/1',
      });

      expect(response.statusCode).toBe(200);
      const body = JSON.parse(response.body);
      expect(body.data.paper.title).toBe('Test Paper 1');
      expect(body.data.paper.created_at).toBe('2024-05-01T12:00:00.000Z');
      expect(body.data.sections).toHaveLength(1);
      expect(body.data.sections[0].summary).toBe('Introduces the test paper');
    });

    it('should return 404 for a non-existent paper', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/papers/999',
      });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error.code).toBe('PAPER_NOT_FOUND');
    });

    it('should reject a non-numeric id', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/papers/abc',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('INVALID_PAPER_ID');
    });

    it('should reject an id beyond the integer column range', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/papers/2147483648',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).error.code).toBe('INVALID_PAPER_ID');
    });

    it('should accept the largest integer id', async () => {
      const response = await server.inject({
        method: 'GET',
        url: '/api/papers/2147483647',
      });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).error.code).toBe('PAPER_NOT_FOUND');
    });
  });
});

describe('Papers API errors', () => {
  it('should map persistence failures to 500 PERSISTENCE_FAILURE', async () => {
    class FailingStore extends MockPapersStore {
      async listPapers(): Promise<never> {
        throw new PersistenceFailure('list papers', new Error('ECONNREFUSED'));
      }
    }
    const { server, cleanup } = await createTestServer({ store: new FailingStore() });

    try {
      const response = await server.inject({ method: 'GET', url: '/api/papers' });

      expect(response.statusCode).toBe(500);
      expect(JSON.parse(response.body).error).toEqual({
        message: 'Failed to list papers: ECONNREFUSED',
        code: 'PERSISTENCE_FAILURE',
        statusCode: 500,
      });
    } finally {
      await cleanup();
    }
  });

  it('should map other errors to 500 INTERNAL_ERROR', async () => {
    class BrokenStore extends MockPapersStore {
      async getPaperById(): Promise<never> {
        throw new Error('unexpected row shape');
      }
    }
    const { server, cleanup } = await createTestServer({ store: new BrokenStore() });

    try {
      const response = await server.inject({ method: 'GET', url: '/api/papers/1' });

      expect(response.statusCode).toBe(500);
      expect(JSON.parse(response.body).error).toEqual({
        message: 'unexpected row shape',
        code: 'INTERNAL_ERROR',
        statusCode: 500,
      });
    } finally {
      await cleanup();
    }
  });
});
