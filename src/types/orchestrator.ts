/**
 * Orchestrator Domain Types
 *
 * SCOPE: LLM interaction, prompt assembly, the bounded turn loop and the
 * errors it can surface
 */

import type { ResponsePayload, Mode, TerminalAnswer } from './answer.js';
import type { ActorContext } from './auth.js';
import type { ErrorInfo } from './result.js';
import type { ToolCallRequest, ToolFailureReason } from './tool.js';

// ─────────────────────────────────────────────────────────────
// LLM CLIENT TYPES
// ─────────────────────────────────────────────────────────────

/**
 * OpenAI-compatible message format
 */
export interface LLMMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  tool_call_id?: string;
  tool_calls?: LLMToolCall[];
}

/**
 * Tool call from LLM response
 */
export interface LLMToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: string; // JSON string
  };
}

/**
 * Tool definition in OpenAI function format
 */
export interface LLMToolDefinition {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>; // JSON Schema
  };
}

/**
 * Chat completion request
 */
export interface LLMRequest {
  model: string;
  messages: LLMMessage[];
  tools?: LLMToolDefinition[];
  tool_choice?: 'none' | 'auto' | 'required';
  max_tokens?: number;
  temperature?: number;
}

/**
 * Non-streaming LLM response
 */
export interface LLMResponse {
  id: string;
  model: string;
  choices: Array<{
    index: number;
    message: LLMMessage;
    finish_reason:
      | 'stop'
      | 'tool_calls'
      | 'length'
      | 'content_filter'
      | 'error';
  }>;
  usage: {
    prompt_tokens: number;
    completion_tokens: number;
    total_tokens: number;
  };
}

/**
 * Per-call options for an LLM request
 */
export interface LLMCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * LLM Client interface
 */
export interface LLMClient {
  complete(request: LLMRequest, options?: LLMCallOptions): Promise<LLMResponse>;
}

// ─────────────────────────────────────────────────────────────
// ORCHESTRATOR CONFIG
// ─────────────────────────────────────────────────────────────

export interface OrchestratorConfig {
  /** Model identifier (e.g., 'google/gemini-2.5-flash') */
  model: string;

  /** Context budget for the prompt, in estimated tokens */
  maxInputTokens: number;

  /** Maximum output tokens for each LLM call */
  maxOutputTokens: number;

  /** Hard cap on LLM turns per run */
  maxIterations: number;

  /** Timeout for each LLM call (ms) */
  llmCallTimeout: number;

  /** Timeout for each tool call (ms) */
  toolCallTimeout: number;

  /** Whole-run deadline (ms); defaults to the iteration cap's worst case */
  runTimeout?: number;

  /** How long a run waits for the conversation lock (ms) */
  lockWaitTimeout: number;

  /** Temperature for generation (0-2) */
  temperature: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  model: 'google/gemini-2.5-flash',
  maxInputTokens: 60000,
  maxOutputTokens: 4096,
  maxIterations: 6,
  llmCallTimeout: 60000,
  toolCallTimeout: 20000,
  lockWaitTimeout: 30000,
  temperature: 0.7,
};

/**
 * Whole-run deadline for a config: explicit value, or the sum of the
 * iteration cap's worst case
 */
export function resolveRunTimeout(config: OrchestratorConfig): number {
  return (
    config.runTimeout ??
    config.maxIterations * (config.llmCallTimeout + config.toolCallTimeout)
  );
}

// ─────────────────────────────────────────────────────────────
// PROMPT BUILDER
// ─────────────────────────────────────────────────────────────

/**
 * Request-scoped context injected into the system prompt
 */
export interface RequestContext {
  /** User's local time as reported by the client */
  localTime?: string;
  /** Coarse location supplied by the client, e.g. "Nairobi, Kenya" */
  locationHint?: string;
  /** Client IP, used by the locate tool when no ip argument is given */
  clientIp?: string;
}

export interface PromptBuildOptions {
  maxInputTokens: number;
  context?: RequestContext;
}

export interface PromptPayload {
  messages: LLMMessage[];
  tools: LLMToolDefinition[];
  estimatedTokens: number;
  /** Number of history messages dropped to fit the budget */
  truncatedCount: number;
}

// ─────────────────────────────────────────────────────────────
// ORCHESTRATION RUN
// ─────────────────────────────────────────────────────────────

/**
 * Explicit loop states
 */
export type LoopState = 'awaiting-llm' | 'dispatching-tools' | 'terminal' | 'failed';

export type OrchestrationErrorCode =
  | 'MALFORMED_TERMINAL_ANSWER'
  | 'UNRESOLVED_REFERENCE'
  | 'ORCHESTRATION_EXHAUSTED'
  | 'ORCHESTRATION_TIMEOUT'
  | 'ORCHESTRATION_CANCELLED'
  | 'CONVERSATION_LOCK_CONTENTION'
  | 'LLM_ERROR'
  | 'STATE_STORE_ERROR';

export interface OrchestrationError extends ErrorInfo<OrchestrationErrorCode> {
  /** Client-facing conversation id, so a retry can resume context */
  conversationId: string;
  retryable: boolean;
  /** Degraded answer synthesised from accumulated tool results */
  partial?: TerminalAnswer;
}

export interface RunInput {
  /** Client-facing conversation id (scoped by actor internally) */
  conversationId: string;
  userQuery: string;
  mode: Mode;
  actor: ActorContext;
  context?: RequestContext;
  /** Caller cancellation */
  signal?: AbortSignal;
  /** Create a share record for the terminal answer */
  share?: boolean;
}

export interface ToolCallSummary {
  callId: string;
  toolName: string;
  args: Record<string, unknown>;
  status: 'success' | 'failure';
  reason?: ToolFailureReason;
  durationMs: number;
}

export interface RunResult {
  runId: string;
  conversationId: string;
  answer: TerminalAnswer;
  response: ResponsePayload;
  iterations: number;
  toolCalls: ToolCallSummary[];
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
  shareId?: string;
}

// ─────────────────────────────────────────────────────────────
// TURN AUDIT EVENTS
// ─────────────────────────────────────────────────────────────

export interface TurnEvent {
  runId: string;
  requestId: string;
  actorId: string | null;
  conversationKey: string;
  mode: Mode;
  turn: number;
  state: LoopState;
  toolCalls: ToolCallRequest[];
  toolResults: Array<{
    callId: string;
    tool: string;
    status: 'success' | 'failure';
    reason?: ToolFailureReason;
    durationMs: number;
  }>;
  outcome?: 'terminal' | 'failed';
  errorCode?: OrchestrationErrorCode;
  answerKind?: TerminalAnswer['kind'];
  truncatedCount: number;
  timestamp: string;
}

/**
 * Receives one event per turn, as data
 */
export interface TurnEventSink {
  record(event: TurnEvent): Promise<void>;
}
