/**
 * Tool Adapter Types
 *
 * SCOPE: Internal types for tool execution infrastructure
 *
 * Adapters are stateless and safe to call concurrently. They never touch
 * conversation state; the orchestrator is the single writer.
 */

import type { z } from 'zod';

import type {
  Result,
  ToolCallRequest,
  ToolDefinition,
  ToolFailureReason,
  ToolName,
  ToolResult,
} from '@/types/index.js';

/**
 * Context passed to tool handlers during execution
 */
export interface ToolExecutionContext {
  requestId: string;
  conversationKey: string;
  /** Client IP of the originating request, when known */
  clientIp?: string;
  /** Aborted on per-call timeout, run deadline or caller cancellation */
  signal: AbortSignal;
}

/**
 * A validated call, ready to run against the external dependency
 */
export type PreparedToolCall = (
  context: ToolExecutionContext
) => Promise<Record<string, unknown>>;

/**
 * Uniform adapter contract over the closed tool set
 */
export interface ToolAdapter {
  readonly name: ToolName;
  readonly definition: ToolDefinition;
  /**
   * Validate raw arguments. Fails with the validation message without
   * touching the external dependency.
   */
  prepare(args: Record<string, unknown>): Result<PreparedToolCall>;
}

/**
 * Adapter definition: schema-validated arguments and a typed handler
 */
export interface ToolAdapterSpec<S extends z.ZodTypeAny> {
  name: ToolName;
  description: string;
  /** JSON Schema shown to the LLM */
  inputSchema: Record<string, unknown>;
  /** Runtime schema for the same arguments */
  args: S;
  handler: (
    args: z.output<S>,
    context: ToolExecutionContext
  ) => Promise<Record<string, unknown>>;
}

/**
 * Registry of adapters keyed by tool name
 */
export type ToolAdapterRegistry = Map<ToolName, ToolAdapter>;

/**
 * Tool executor: validation, timeout and error capture around adapters
 */
export interface ToolExecutor {
  execute(
    request: ToolCallRequest,
    context: Omit<ToolExecutionContext, 'signal'> & { signal?: AbortSignal }
  ): Promise<ToolResult>;
}

/**
 * Tool error for controlled failures
 */
export class ToolError extends Error {
  constructor(
    public readonly code: ToolFailureReason,
    message: string
  ) {
    super(message);
    this.name = 'ToolError';
  }
}
