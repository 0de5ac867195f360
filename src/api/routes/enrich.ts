/**
 * Enrich Route
 * Direct product enrichment (images and shopping offers), outside any
 * conversation
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { ToolExecutor } from '@/tools/index.js';

import {
  errorResponse,
  getRequestId,
  readJsonBody,
  successResponse,
} from '../utils/response.js';

const bodySchema = z.record(z.string(), z.unknown());

interface EnrichRoutesDeps {
  enrichExecutor: ToolExecutor;
}

/**
 * Create enrich routes
 */
export function createEnrichRoutes(deps: EnrichRoutesDeps): Hono {
  const { enrichExecutor } = deps;
  const app = new Hono();

  /**
   * POST /enrich
   * Body: { productNames: string[] }
   */
  app.post('/enrich', async (c) => {
    const requestId = getRequestId(c);
    const body = bodySchema.safeParse(await readJsonBody(c));

    const result = await enrichExecutor.execute(
      {
        id: requestId,
        name: 'enrich',
        args: body.success ? body.data : {},
      },
      {
        requestId,
        conversationKey: `direct:${requestId}`,
        signal: c.req.raw.signal,
      }
    );

    if (result.status === 'failure') {
      return errorResponse(
        c,
        {
          code:
            result.reason === 'INVALID_TOOL_ARGUMENTS'
              ? 'VALIDATION_ERROR'
              : result.reason,
          message: result.message,
        },
        requestId
      );
    }

    return successResponse(c, result.output, requestId);
  });

  return app;
}
