/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { ActorContext } from '@/types/index.js';

import { getErrorStatus } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        ...(error.details !== undefined && { details: error.details }),
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}

/**
 * Helper to get actor from context
 */
export function getActor(c: Context): ActorContext {
  return c.get('actor');
}

/**
 * Helper to get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') || getActor(c).requestId;
}

/**
 * Read a JSON body; a missing or malformed body reads as empty
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    return {};
  }
}
