/**
 * API Layer Exports
 *
 * API layer is thin - delegates to the orchestrator and services for all
 * business logic.
 */

export { createApp } from './app.js';
export type { AppConfig } from './app.js';
export type { ApiServices } from './types.js';
export {
  createRateLimitMiddleware,
  createInMemoryRateLimiter,
  createUpstashRateLimiter,
} from './middleware/rateLimit.js';
export type { RateLimiter, RateLimitConfig } from './middleware/rateLimit.js';
export type { TokenVerifier } from './middleware/auth.js';
