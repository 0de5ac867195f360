/**
 * Share Routes
 * Resolve shared answers publicly; share the latest answer of a
 * conversation
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { ShareService } from '@/services/index.js';

import {
  errorResponse,
  getActor,
  getRequestId,
  readJsonBody,
  successResponse,
} from '../utils/response.js';

const shareBodySchema = z.object({
  conversationId: z
    .string({ required_error: 'conversationId is required' })
    .trim()
    .min(1, 'conversationId must not be empty'),
});

interface ShareRoutesDeps {
  shareService: ShareService;
}

/**
 * GET /share/:shareId
 * Public: no actor needed
 */
export function createPublicShareRoutes(deps: ShareRoutesDeps): Hono {
  const { shareService } = deps;
  const app = new Hono();

  app.get('/share/:shareId', async (c) => {
    const requestId = getRequestId(c);

    const result = await shareService.decode(c.req.param('shareId'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}

/**
 * POST /share
 * Share the latest answer of one of the caller's conversations
 */
export function createShareRoutes(deps: ShareRoutesDeps): Hono {
  const { shareService } = deps;
  const app = new Hono();

  app.post('/share', async (c) => {
    const actor = getActor(c);
    const requestId = getRequestId(c);

    const validation = shareBodySchema.safeParse(await readJsonBody(c));
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

    const result = await shareService.shareConversation(
      actor,
      validation.data.conversationId
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId, 201);
  });

  return app;
}
