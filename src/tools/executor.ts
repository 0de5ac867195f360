/**
 * Tool Executor Factory
 *
 * Routes tool calls to their adapter. Every outcome - unknown tool, invalid
 * arguments, timeout, thrown error - comes back as a ToolResult so the
 * orchestrator can feed it to the LLM instead of aborting the run.
 */

import type {
  ToolCallRequest,
  ToolFailureReason,
  ToolResult,
} from '@/types/index.js';
import { isToolName } from '@/types/index.js';
import { abortable, linkSignals } from '@/lib/abort.js';

import type { ToolAdapterRegistry, ToolExecutor } from './types.js';
import { ToolError } from './types.js';

/**
 * Dependencies for creating a tool executor
 */
export interface CreateToolExecutorDeps {
  /** Registry of tool adapters */
  adapters: ToolAdapterRegistry;

  /** Timeout for each tool call (ms) */
  defaultTimeout: number;
}

/**
 * Create a tool executor instance
 */
export function createToolExecutor(deps: CreateToolExecutorDeps): ToolExecutor {
  const { adapters, defaultTimeout } = deps;

  function fail(
    request: ToolCallRequest,
    reason: ToolFailureReason,
    message: string,
    startTime: number
  ): ToolResult {
    return {
      callId: request.id,
      tool: request.name,
      status: 'failure',
      reason,
      message,
      durationMs: Date.now() - startTime,
    };
  }

  return {
    async execute(request, context): Promise<ToolResult> {
      const startTime = Date.now();

      const adapter = isToolName(request.name)
        ? adapters.get(request.name)
        : undefined;

      if (!adapter) {
        return fail(
          request,
          'INVALID_TOOL_ARGUMENTS',
          `Unknown tool: ${request.name}`,
          startTime
        );
      }

      // Validate before touching the external dependency
      const prepared = adapter.prepare(request.args);
      if (!prepared.success) {
        return fail(
          request,
          'INVALID_TOOL_ARGUMENTS',
          prepared.error.message,
          startTime
        );
      }

      const linked = linkSignals([context.signal], {
        ms: defaultTimeout,
        reason: () =>
          new ToolError(
            'TOOL_TIMEOUT',
            `Tool '${request.name}' timed out after ${defaultTimeout}ms`
          ),
      });

      try {
        const output = await abortable(
          prepared.data({ ...context, signal: linked.signal }),
          linked.signal
        );
        return {
          callId: request.id,
          tool: request.name,
          status: 'success',
          output,
          durationMs: Date.now() - startTime,
        };
      } catch (error) {
        if (error instanceof ToolError) {
          return fail(request, error.code, error.message, startTime);
        }
        const message =
          error instanceof Error ? error.message : 'Unknown error';
        return fail(request, 'TOOL_FAILURE', message, startTime);
      } finally {
        linked.dispose();
      }
    },
  };
}
