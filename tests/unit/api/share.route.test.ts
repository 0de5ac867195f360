/**
 * Share Route Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { createTestApp, send, TEST_TOKENS } from '../../helpers/api-utils.js';
import { jsonReply } from '../../helpers/test-utils.js';

const token = TEST_TOKENS['user-1'];
const answer = { kind: 'research-result', degraded: false, answer: 'LED.', citations: [] };

describe('Share Routes', () => {
  describe('GET /share/:shareId', () => {
    it('should resolve a share created by a run without authentication', async () => {
      const { app } = createTestApp({ steps: [jsonReply({ answer: 'LED.' })] });
      const run = await send(app, 'POST', '/api/v1/research', {
        body: { query: 'Which lamp?', share: true },
        token,
      });
      expect(await run.json()).toMatchObject({ data: { shareId: 'share-1' } });

      const res = await send(app, 'GET', '/api/v1/share/share-1');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        data: answer,
        meta: { requestId: expect.any(String) },
      });
    });

    it('should return 404 for an unknown share', async () => {
      const { app } = createTestApp();

      const res = await send(app, 'GET', '/api/v1/share/missing');

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({
        error: { code: 'NOT_FOUND', message: 'Share not found' },
      });
    });
  });

  describe('POST /share', () => {
    it('should share the latest answer of a conversation', async () => {
      const { app } = createTestApp({ steps: [jsonReply({ answer: 'LED.' })] });
      await send(app, 'POST', '/api/v1/research', {
        body: { query: 'Which lamp?', conversationId: 'conv-1' },
        token,
      });

      const res = await send(app, 'POST', '/api/v1/share', {
        body: { conversationId: 'conv-1' },
        token,
      });

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        data: { shareId: 'share-1' },
        meta: { requestId: expect.any(String) },
      });
      const shared = await send(app, 'GET', '/api/v1/share/share-1');
      expect(await shared.json()).toMatchObject({ data: answer });
    });

    it("should not share another user's conversation", async () => {
      const { app } = createTestApp({ steps: [jsonReply({ answer: 'LED.' })] });
      await send(app, 'POST', '/api/v1/research', {
        body: { query: 'Which lamp?', conversationId: 'conv-1' },
        token,
      });

      const res = await send(app, 'POST', '/api/v1/share', {
        body: { conversationId: 'conv-1' },
        token: TEST_TOKENS['user-2'],
      });

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({
        error: { code: 'NOT_FOUND', message: 'Conversation has no answer to share' },
      });
    });

    it('should require a conversation id', async () => {
      const { app } = createTestApp();

      const res = await send(app, 'POST', '/api/v1/share', { body: {}, token });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: { code: 'VALIDATION_ERROR', message: 'conversationId is required' },
      });
    });

    it('should require authentication', async () => {
      const { app } = createTestApp();

      const res = await send(app, 'POST', '/api/v1/share', {
        body: { conversationId: 'conv-1' },
      });

      expect(res.status).toBe(401);
    });
  });
});
