/**
 * Auth Middleware
 * Constructs ActorContext from a Supabase JWT, or an anonymous actor when
 * authentication is disabled
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Context, MiddlewareHandler, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { ActorContext } from '@/types/index.js';

/**
 * Minimal Supabase surface used to verify access tokens
 */
export type TokenVerifier = Pick<SupabaseClient['auth'], 'getUser'>;

/**
 * Auth middleware dependencies
 */
interface AuthMiddlewareDeps {
  auth: TokenVerifier;
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

/**
 * Client address as reported by the proxy in front of the server
 */
export function clientIp(c: Context): string | undefined {
  const forwarded = c.req.header('x-forwarded-for');
  const first = forwarded?.split(',')[0]?.trim();
  if (first) {
    return first;
  }
  return c.req.header('x-real-ip');
}

function unauthorized(c: Context, requestId: string, message: string): Response {
  return c.json(
    {
      error: {
        code: 'UNAUTHORIZED',
        message,
        requestId,
      },
    },
    401
  );
}

/**
 * Create auth middleware for protected routes
 * Extracts JWT, verifies with Supabase, constructs ActorContext
 */
export function createAuthMiddleware(
  deps: AuthMiddlewareDeps
): MiddlewareHandler {
  const { auth } = deps;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return unauthorized(c, requestId, 'Missing or invalid authorization header');
    }

    const token = authHeader.slice(7).trim();
    if (!token) {
      return unauthorized(c, requestId, 'Missing or invalid authorization header');
    }

    try {
      // 2. Verify JWT with Supabase
      const {
        data: { user },
        error,
      } = await auth.getUser(token);

      if (error || !user) {
        return unauthorized(c, requestId, 'Invalid or expired token');
      }

      // 3. Construct ActorContext
      const ip = clientIp(c);
      const userAgent = c.req.header('user-agent');

      const actor: ActorContext = {
        type: 'user',
        userId: user.id,
        requestId,
        permissions: [],
        ...(ip !== undefined && { ip }),
        ...(userAgent !== undefined && { userAgent }),
      };

      // 4. Attach to context
      c.set('actor', actor);
      c.set('requestId', requestId);

      return next();
    } catch (err) {
      console.error('[auth] Token verification failed:', err);
      return c.json(
        {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'Authentication failed',
            requestId,
          },
        },
        500
      );
    }
  };
}

/**
 * Create public middleware for routes that don't require auth
 * Creates an anonymous actor
 */
export function createPublicMiddleware(): MiddlewareHandler {
  return function publicMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();

    const ip = clientIp(c);
    const userAgent = c.req.header('user-agent');

    const actor: ActorContext = {
      type: 'anonymous',
      requestId,
      permissions: [],
      ...(ip !== undefined && { ip }),
      ...(userAgent !== undefined && { userAgent }),
    };

    c.set('actor', actor);
    c.set('requestId', requestId);

    return next();
  };
}
