/**
 * Conversation Routes
 * The caller's conversation list, history and titles
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { ConversationService } from '@/services/index.js';
import { MAX_TITLE_LENGTH, normalizePaginationParams } from '@/types/index.js';

import {
  errorResponse,
  getActor,
  getRequestId,
  readJsonBody,
  successResponse,
} from '../utils/response.js';

interface ConversationRoutesDeps {
  conversationService: ConversationService;
}

const titleBodySchema = z.object({
  title: z
    .string({ required_error: 'title is required' })
    .trim()
    .min(1, 'title must not be empty')
    .max(MAX_TITLE_LENGTH, `title must be at most ${MAX_TITLE_LENGTH} characters`),
});

/**
 * Parse limit query param; invalid values fall back to the default
 */
function parseLimit(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Create conversation routes
 */
export function createConversationRoutes(deps: ConversationRoutesDeps): Hono {
  const { conversationService } = deps;
  const app = new Hono();

  /**
   * GET /conversations
   * The caller's conversations, most recently updated first
   */
  app.get('/conversations', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const limit = parseLimit(c.req.query('limit'));
    const cursor = c.req.query('cursor');

    const result = await conversationService.listConversations(
      actor,
      normalizePaginationParams({
        ...(limit !== undefined && { limit }),
        ...(cursor !== undefined && { cursor }),
      })
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  /**
   * GET /conversations/:conversationId
   * Messages in insertion order
   */
  app.get('/conversations/:conversationId', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const conversationId = c.req.param('conversationId');

    const result = await conversationService.getHistory(actor, conversationId);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      {
        conversationId,
        messages: result.data.messages,
      },
      requestId
    );
  });

  /**
   * PATCH /conversations/:conversationId/title
   * Rename a conversation
   */
  app.patch('/conversations/:conversationId/title', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);
    const conversationId = c.req.param('conversationId');

    const validation = titleBodySchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return errorResponse(
        c,
        {
          code: 'VALIDATION_ERROR',
          message: validation.error.issues[0]?.message ?? 'Invalid request',
        },
        requestId
      );
    }

    const result = await conversationService.renameConversation(
      actor,
      conversationId,
      validation.data.title
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}
