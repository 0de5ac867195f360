/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

import type { ActorContext } from '@/types/index.js';
import type { Orchestrator } from '@/orchestrator/index.js';
import type { ConversationService, ShareService } from '@/services/index.js';
import type { ToolExecutor } from '@/tools/index.js';

/**
 * Extended Hono context with actor
 */
declare module 'hono' {
  interface ContextVariableMap {
    actor: ActorContext;
    requestId: string;
  }
}

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<string, ContentfulStatusCode> = {
  VALIDATION_ERROR: 400,
  INVALID_TOOL_ARGUMENTS: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  ORCHESTRATION_CANCELLED: 408,
  CONVERSATION_LOCK_CONTENTION: 409,
  ORCHESTRATION_EXHAUSTED: 422,
  RATE_LIMITED: 429,
  INTERNAL_ERROR: 500,
  STATE_STORE_ERROR: 500,
  MALFORMED_TERMINAL_ANSWER: 502,
  UNRESOLVED_REFERENCE: 502,
  LLM_ERROR: 502,
  TOOL_FAILURE: 502,
  ORCHESTRATION_TIMEOUT: 504,
  TOOL_TIMEOUT: 504,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: string): ContentfulStatusCode {
  return ERROR_STATUS_MAP[code] ?? 500;
}

/**
 * Service context for dependency injection
 */
export interface ApiServices {
  orchestrator: Orchestrator;
  shareService: ShareService;
  conversationService: ConversationService;
  /** Executor over the enrich adapter, for direct enrichment */
  enrichExecutor: ToolExecutor;
}
