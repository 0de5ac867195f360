/**
 * Orchestration Routes
 * One endpoint per mode; each runs the orchestrator for a single query
 */

import { Hono } from 'hono';
import { nanoid } from 'nanoid';
import { z } from 'zod';

import type { Orchestrator } from '@/orchestrator/index.js';
import { MODES } from '@/types/index.js';

import {
  errorResponse,
  getActor,
  getRequestId,
  readJsonBody,
  successResponse,
} from '../utils/response.js';

/**
 * Query max length
 */
const MAX_QUERY_LENGTH = 4000;

/**
 * Seconds a client should wait after lock contention
 */
export const CONTENTION_RETRY_AFTER_SECONDS = 2;

const runBodySchema = z.object({
  query: z
    .string({ required_error: 'query is required' })
    .trim()
    .min(1, 'query must not be empty')
    .max(
      MAX_QUERY_LENGTH,
      `query must be at most ${MAX_QUERY_LENGTH} characters`
    ),
  conversationId: z
    .string()
    .trim()
    .min(1)
    .max(128)
    .regex(
      /^[A-Za-z0-9_-]+$/,
      'conversationId may only contain letters, digits, _ and -'
    )
    .optional(),
  localTime: z.string().trim().max(100).optional(),
  location: z.string().trim().min(1).max(100).optional(),
  share: z.boolean().default(false),
});

interface OrchestrateRoutesDeps {
  orchestrator: Orchestrator;
}

/**
 * Create orchestration routes
 */
export function createOrchestrateRoutes(deps: OrchestrateRoutesDeps): Hono {
  const { orchestrator } = deps;
  const app = new Hono();

  for (const mode of MODES) {
    /**
     * POST /{mode}
     * Run one query; a new conversation is started when no id is given
     */
    app.post(`/${mode}`, async (c) => {
      const actor = getActor(c);
      const requestId = getRequestId(c);

      const validation = runBodySchema.safeParse(await readJsonBody(c));
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

      const body = validation.data;
      const conversationId = body.conversationId ?? nanoid();

      const result = await orchestrator.run({
        conversationId,
        userQuery: body.query,
        mode,
        actor,
        context: {
          ...(body.localTime !== undefined && { localTime: body.localTime }),
          ...(body.location !== undefined && { locationHint: body.location }),
          ...(actor.ip !== undefined && { clientIp: actor.ip }),
        },
        signal: c.req.raw.signal,
        share: body.share,
      });

      if (!result.success) {
        const { code, message, details, ...context } = result.error;
        if (code === 'CONVERSATION_LOCK_CONTENTION') {
          c.header('Retry-After', CONTENTION_RETRY_AFTER_SECONDS.toString());
        }
        return errorResponse(
          c,
          { code, message, details: { ...details, ...context } },
          requestId
        );
      }

      return successResponse(c, result.data, requestId);
    });
  }

  return app;
}
