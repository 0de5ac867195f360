/**
 * Rate Limiting Middleware
 * Upstash Redis for distributed rate limiting, in-memory otherwise
 */

import type { Ratelimit } from '@upstash/ratelimit';
import type { Context, MiddlewareHandler, Next } from 'hono';

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  /**
   * Maximum requests allowed in the window
   */
  limit: number;

  /**
   * Window duration in seconds
   */
  window: number;

  /**
   * Optional: Get identifier from context (defaults to user, then IP)
   */
  getIdentifier?: (c: Context) => string;
}

/**
 * Rate limit decision
 */
export interface RateLimitResult {
  success: boolean;
  limit: number;
  remaining: number;
  /** Seconds until the window resets */
  reset: number;
}

/**
 * Rate limiter interface (injectable for testing)
 */
export interface RateLimiter {
  limit: (identifier: string) => Promise<RateLimitResult>;
}

/**
 * Default rate limit config
 */
export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  limit: 30,
  window: 60,
};

/**
 * Get identifier from context
 * Priority: userId > IP > 'unknown'
 */
function defaultGetIdentifier(c: Context): string {
  const actor = c.get('actor');
  if (actor.userId) {
    return `user:${actor.userId}`;
  }
  return `ip:${actor.ip ?? 'unknown'}`;
}

/**
 * Create rate limit middleware. Must run after the auth middleware.
 */
export function createRateLimitMiddleware(
  rateLimiter: RateLimiter,
  config: RateLimitConfig = DEFAULT_RATE_LIMIT_CONFIG
): MiddlewareHandler {
  const getIdentifier = config.getIdentifier ?? defaultGetIdentifier;

  return async function rateLimitMiddleware(c: Context, next: Next) {
    const identifier = getIdentifier(c);

    const result = await rateLimiter.limit(identifier);

    // Set rate limit headers
    c.header('X-RateLimit-Limit', result.limit.toString());
    c.header('X-RateLimit-Remaining', result.remaining.toString());
    c.header('X-RateLimit-Reset', result.reset.toString());

    if (!result.success) {
      c.header('Retry-After', result.reset.toString());
      return c.json(
        {
          error: {
            code: 'RATE_LIMITED',
            message: 'Too many requests',
            details: {
              retryAfter: result.reset,
              limit: result.limit,
            },
            requestId: c.get('requestId'),
          },
        },
        429
      );
    }

    return next();
  };
}

/**
 * Create Upstash rate limiter
 *
 * ```typescript
 * const ratelimit = new Ratelimit({
 *   redis,
 *   limiter: Ratelimit.slidingWindow(30, '60 s'),
 *   prefix: 'ratelimit',
 * });
 * const rateLimiter = createUpstashRateLimiter(ratelimit);
 * ```
 */
export function createUpstashRateLimiter(
  upstashRatelimit: Pick<Ratelimit, 'limit'>
): RateLimiter {
  return {
    async limit(identifier: string): Promise<RateLimitResult> {
      const result = await upstashRatelimit.limit(identifier);
      return {
        success: result.success,
        limit: result.limit,
        remaining: result.remaining,
        // Upstash reports the reset as a unix timestamp in milliseconds
        reset: Math.max(0, Math.ceil((result.reset - Date.now()) / 1000)),
      };
    },
  };
}

/**
 * Create in-memory rate limiter (for testing/development)
 */
export function createInMemoryRateLimiter(
  config: RateLimitConfig
): RateLimiter {
  const store = new Map<string, { count: number; resetAt: number }>();

  return {
    limit(identifier: string): Promise<RateLimitResult> {
      const now = Date.now();
      const windowMs = config.window * 1000;

      let entry = store.get(identifier);

      // Check if window has expired
      if (entry && entry.resetAt <= now) {
        entry = undefined;
        store.delete(identifier);
      }

      if (!entry) {
        entry = { count: 0, resetAt: now + windowMs };
        store.set(identifier, entry);
      }

      entry.count++;

      return Promise.resolve({
        success: entry.count <= config.limit,
        limit: config.limit,
        remaining: Math.max(0, config.limit - entry.count),
        reset: Math.ceil((entry.resetAt - now) / 1000),
      });
    },
  };
}
