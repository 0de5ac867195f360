/**
 * Application Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { Ratelimit } from '@upstash/ratelimit';

import {
  createApp,
  createInMemoryRateLimiter,
  createUpstashRateLimiter,
} from './api/index.js';
import type { RateLimiter } from './api/index.js';
import { loadEnv } from './config/env.js';
import type { Env } from './config/env.js';
import {
  createSupabaseAdmin,
  createUpstashLeaseClient,
  getRedis,
} from './lib/index.js';
import {
  createInMemoryConversationLock,
  createLLMClient,
  createOrchestrator,
  createRedisConversationLock,
} from './orchestrator/index.js';
import type { ConversationLock } from './orchestrator/index.js';
import {
  createAuditService,
  createAuditServiceDb,
  createAuditTurnEventSink,
  createConversationService,
  createConversationStoreDb,
  createInMemoryConversationStore,
  createInMemoryShareDb,
  createInMemoryTurnEventSink,
  createShareService,
  createShareServiceDb,
} from './services/index.js';
import {
  createGeolocationClient,
  createSerperClient,
  createToolAdapters,
  createToolExecutor,
  pickAdapters,
} from './tools/index.js';
import type { OrchestratorConfig } from './types/index.js';
import {
  DEFAULT_ORCHESTRATOR_CONFIG,
  resolveRunTimeout,
} from './types/index.js';

let env: Env;
try {
  env = loadEnv();
} catch (error) {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
}

const config: OrchestratorConfig = {
  ...DEFAULT_ORCHESTRATOR_CONFIG,
  model: env.LLM_MODEL,
  maxInputTokens: env.MAX_INPUT_TOKENS,
  maxOutputTokens: env.MAX_OUTPUT_TOKENS,
  maxIterations: env.MAX_ITERATIONS,
  llmCallTimeout: env.LLM_CALL_TIMEOUT_MS,
  toolCallTimeout: env.TOOL_CALL_TIMEOUT_MS,
  lockWaitTimeout: env.LOCK_WAIT_MS,
  ...(env.RUN_TIMEOUT_MS !== undefined && { runTimeout: env.RUN_TIMEOUT_MS }),
};

// Persistence: Supabase when configured, in-memory otherwise
const supabase =
  env.SUPABASE_URL && env.SUPABASE_SERVICE_KEY
    ? createSupabaseAdmin({
        url: env.SUPABASE_URL,
        serviceKey: env.SUPABASE_SERVICE_KEY,
      })
    : null;

const conversationStore = supabase
  ? createConversationStoreDb(supabase)
  : createInMemoryConversationStore();
const shareService = createShareService({
  db: supabase ? createShareServiceDb(supabase) : createInMemoryShareDb(),
  conversationStore,
});
const conversationService = createConversationService({
  store: conversationStore,
});
const eventSink = supabase
  ? createAuditTurnEventSink({
      auditService: createAuditService({ db: createAuditServiceDb(supabase) }),
    })
  : createInMemoryTurnEventSink();

// Conversation lock and rate limiting: Upstash when configured
const redis =
  env.UPSTASH_REDIS_URL && env.UPSTASH_REDIS_TOKEN
    ? getRedis({ url: env.UPSTASH_REDIS_URL, token: env.UPSTASH_REDIS_TOKEN })
    : null;

const lock: ConversationLock = redis
  ? createRedisConversationLock(createUpstashLeaseClient(redis), {
      // A lease outlives the longest possible run
      leaseMs: resolveRunTimeout(config) + 5000,
      pollIntervalMs: 250,
    })
  : createInMemoryConversationLock();

const rateLimiter: RateLimiter = redis
  ? createUpstashRateLimiter(
      new Ratelimit({
        redis,
        limiter: Ratelimit.slidingWindow(
          env.RATE_LIMIT_REQUESTS,
          `${env.RATE_LIMIT_WINDOW_SECONDS} s`
        ),
        prefix: 'ratelimit',
      })
    )
  : createInMemoryRateLimiter({
      limit: env.RATE_LIMIT_REQUESTS,
      window: env.RATE_LIMIT_WINDOW_SECONDS,
    });

// Tools and LLM
const adapters = createToolAdapters({
  serper: createSerperClient({ apiKey: env.SERPER_API_KEY }),
  geolocation: createGeolocationClient({
    apiKey: env.IPGEOLOCATION_API_KEY,
  }),
});

const llmClient = createLLMClient({
  apiKey: env.OPENROUTER_API_KEY,
  baseURL: env.LLM_BASE_URL,
  ...(env.LLM_SITE_URL !== undefined && { siteUrl: env.LLM_SITE_URL }),
  ...(env.LLM_SITE_NAME !== undefined && { siteName: env.LLM_SITE_NAME }),
  timeout: config.llmCallTimeout,
});

const orchestrator = createOrchestrator({
  llmClient,
  adapters,
  store: conversationStore,
  lock,
  shareEncoder: shareService,
  eventSink,
  config,
});

const app = createApp({
  services: {
    orchestrator,
    shareService,
    conversationService,
    enrichExecutor: createToolExecutor({
      adapters: pickAdapters(adapters, ['enrich']),
      defaultTimeout: config.toolCallTimeout,
    }),
  },
  auth: env.AUTH_ENABLED && supabase ? supabase.auth : null,
  rateLimiter,
  rateLimit: {
    limit: env.RATE_LIMIT_REQUESTS,
    window: env.RATE_LIMIT_WINDOW_SECONDS,
  },
  allowedOrigins: env.ALLOWED_ORIGINS,
  health: {
    authEnabled: env.AUTH_ENABLED,
    store: supabase ? 'supabase' : 'memory',
    lock: redis ? 'redis' : 'memory',
  },
  logRequests: env.NODE_ENV !== 'test',
});

console.error(`Server starting on port ${env.PORT}`);
if (!supabase) {
  console.error('[startup] Supabase not configured; using in-memory stores');
}

serve({
  fetch: app.fetch,
  port: env.PORT,
});

export { app };
