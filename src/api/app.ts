/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import { MODES } from '@/types/index.js';

import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import type { TokenVerifier } from './middleware/auth.js';
import { createRateLimitMiddleware } from './middleware/rateLimit.js';
import type { RateLimitConfig, RateLimiter } from './middleware/rateLimit.js';
import { createConversationRoutes } from './routes/conversations.js';
import { createEnrichRoutes } from './routes/enrich.js';
import { createHealthRoutes } from './routes/health.js';
import type { HealthInfo } from './routes/health.js';
import { createOrchestrateRoutes } from './routes/orchestrate.js';
import {
  createPublicShareRoutes,
  createShareRoutes,
} from './routes/share.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
export interface AppConfig {
  services: ApiServices;
  /** Token verification; null serves every request as anonymous */
  auth: TokenVerifier | null;
  rateLimiter?: RateLimiter;
  rateLimit?: RateLimitConfig;
  allowedOrigins?: string[];
  health: HealthInfo;
  /** Request logging (off in tests) */
  logRequests?: boolean;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, auth, rateLimiter, allowedOrigins, health } = config;
  const app = new Hono();

  // Global middleware
  if (config.logRequests ?? true) {
    app.use('*', logger());
  }
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
      exposeHeaders: ['Retry-After', 'X-RateLimit-Remaining'],
    })
  );

  // Public routes (no auth)
  const publicMiddleware = createPublicMiddleware();
  app.use('/api/v1/health', publicMiddleware);
  app.route('/api/v1', createHealthRoutes(health));

  app.get('/api/v1/share/:shareId', publicMiddleware);
  app.route(
    '/api/v1',
    createPublicShareRoutes({ shareService: services.shareService })
  );

  // Everything else runs as the authenticated caller, or anonymously when
  // auth is disabled
  const actorMiddleware = auth
    ? createAuthMiddleware({ auth })
    : publicMiddleware;
  const limited = rateLimiter
    ? [actorMiddleware, createRateLimitMiddleware(rateLimiter, config.rateLimit)]
    : [actorMiddleware];

  // Orchestration routes
  for (const mode of MODES) {
    app.use(`/api/v1/${mode}`, ...limited);
  }
  app.route(
    '/api/v1',
    createOrchestrateRoutes({ orchestrator: services.orchestrator })
  );

  // Enrich route
  app.use('/api/v1/enrich', ...limited);
  app.route(
    '/api/v1',
    createEnrichRoutes({ enrichExecutor: services.enrichExecutor })
  );

  // Share and history routes
  app.post('/api/v1/share', actorMiddleware);
  app.route('/api/v1', createShareRoutes({ shareService: services.shareService }));

  app.use('/api/v1/conversations', actorMiddleware);
  app.use('/api/v1/conversations/*', actorMiddleware);
  app.route(
    '/api/v1',
    createConversationRoutes({
      conversationService: services.conversationService,
    })
  );

  // 404 handler
  app.notFound((c) => {
    const actor = c.get('actor');
    const requestId = actor?.requestId || 'unknown';

    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId,
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('[app] Unhandled error:', err);
    const actor = c.get('actor');
    const requestId = actor?.requestId || 'unknown';

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId,
        },
      },
      500
    );
  });

  return app;
}
