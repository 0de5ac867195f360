/**
 * Main Orchestrator Implementation
 *
 * Ties together the conversation lock, state store, tool loop and share
 * encoder for one query:
 * acquire lock -> load state -> append user message -> tool loop ->
 * optional share -> release lock
 */

import { randomUUID } from 'node:crypto';

import type {
  ConversationState,
  EncodeShareParams,
  LLMClient,
  Message,
  OrchestrationError,
  OrchestrationErrorCode,
  OrchestratorConfig,
  Result,
  RunInput,
  RunResult,
  TerminalAnswer,
  TurnEventSink,
} from '@/types/index.js';
import {
  appendToState,
  createConversationState,
  failWith,
  resolveRunTimeout,
  scopeConversationKey,
  success,
} from '@/types/index.js';
import type { ToolAdapterRegistry } from '@/tools/index.js';
import { createToolExecutor, selectAdapters } from '@/tools/index.js';
import { linkSignals } from '@/lib/abort.js';

import type { ConversationLock } from './conversation-lock.js';
import { createPromptBuilder } from './prompt-builder.js';
import { abortCode, createToolLoop, RunDeadlineError } from './tool-loop.js';

/**
 * Conversation store (minimal subset needed by orchestrator)
 */
export interface OrchestratorStore {
  load(key: string): Promise<ConversationState | null>;
  append(key: string, messages: Message[]): Promise<void>;
}

/**
 * Share encoder (minimal subset needed by orchestrator)
 */
export interface OrchestratorShareEncoder {
  encode(params: EncodeShareParams): Promise<Result<string>>;
}

/**
 * Orchestrator interface
 */
export interface Orchestrator {
  run(input: RunInput): Promise<Result<RunResult, OrchestrationError>>;
}

/**
 * Dependencies for orchestrator
 */
export interface OrchestratorDeps {
  llmClient: LLMClient;
  adapters: ToolAdapterRegistry;
  store: OrchestratorStore;
  lock: ConversationLock;
  shareEncoder: OrchestratorShareEncoder;
  eventSink: TurnEventSink;
  config: OrchestratorConfig;
}

const RETRYABLE: ReadonlySet<OrchestrationErrorCode> = new Set([
  'CONVERSATION_LOCK_CONTENTION',
  'LLM_ERROR',
]);

function orchestrationFailure(
  conversationId: string,
  code: OrchestrationErrorCode,
  message: string,
  extra: { details?: Record<string, unknown>; partial?: TerminalAnswer } = {}
): Result<RunResult, OrchestrationError> {
  return failWith<OrchestrationError>({
    code,
    message,
    conversationId,
    retryable: RETRYABLE.has(code),
    ...extra,
  });
}

/**
 * Create an orchestrator instance
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { llmClient, adapters, store, lock, shareEncoder, eventSink, config } =
    deps;

  const promptBuilder = createPromptBuilder({ adapters });
  const runTimeout = resolveRunTimeout(config);

  return {
    async run(input: RunInput): Promise<Result<RunResult, OrchestrationError>> {
      const { conversationId, mode, actor } = input;
      const runId = randomUUID();
      const conversationKey = scopeConversationKey(actor, conversationId);

      const run = linkSignals([input.signal], {
        ms: runTimeout,
        reason: () => new RunDeadlineError(runTimeout),
      });

      try {
        // Step 1: Serialise runs on this conversation
        const acquired = await lock.acquire(conversationKey, {
          waitMs: config.lockWaitTimeout,
          signal: run.signal,
        });
        if (!acquired.success) {
          if (acquired.error.code === 'LOCK_TIMEOUT') {
            return orchestrationFailure(
              conversationId,
              'CONVERSATION_LOCK_CONTENTION',
              acquired.error.message
            );
          }
          if (acquired.error.code === 'LOCK_UNAVAILABLE') {
            return orchestrationFailure(
              conversationId,
              'STATE_STORE_ERROR',
              acquired.error.message
            );
          }
          const code = abortCode(run.signal);
          return orchestrationFailure(
            conversationId,
            code,
            code === 'ORCHESTRATION_TIMEOUT'
              ? 'Run exceeded its deadline while waiting for the conversation'
              : 'Run was cancelled while waiting for the conversation'
          );
        }

        try {
          // Step 2: Load state and record the query
          const userMessage: Message = {
            role: 'user',
            content: input.userQuery,
            runId,
            createdAt: new Date().toISOString(),
          };

          let state: ConversationState;
          try {
            const loaded = await store.load(conversationKey);
            await store.append(conversationKey, [userMessage]);
            state = appendToState(
              loaded ?? createConversationState(conversationKey),
              [userMessage]
            );
          } catch (error) {
            console.error('[orchestrator] Conversation store failed:', error);
            return orchestrationFailure(
              conversationId,
              'STATE_STORE_ERROR',
              'Failed to load or update the conversation'
            );
          }

          // Step 3: Run the tool loop with this mode's tools only
          const toolLoop = createToolLoop({
            llmClient,
            promptBuilder,
            toolExecutor: createToolExecutor({
              adapters: selectAdapters(adapters, mode),
              defaultTimeout: config.toolCallTimeout,
            }),
            commit: (messages) => store.append(conversationKey, messages),
            eventSink,
            config,
          });

          const outcome = await toolLoop.run({
            runId,
            requestId: actor.requestId,
            actorId: actor.userId ?? null,
            mode,
            state,
            ...(input.context && { context: input.context }),
            signal: run.signal,
          });

          if (outcome.outcome === 'failed') {
            return orchestrationFailure(
              conversationId,
              outcome.code,
              outcome.message,
              {
                ...(outcome.details && { details: outcome.details }),
                ...(outcome.partial && { partial: outcome.partial }),
              }
            );
          }

          // Step 4: Optional share record
          let shareId: string | undefined;
          if (input.share) {
            const shared = await shareEncoder.encode({
              answer: outcome.answer,
              conversationKey,
            });
            if (shared.success) {
              shareId = shared.data;
            } else {
              console.error(
                '[orchestrator] Failed to share answer:',
                shared.error.message
              );
            }
          }

          return success({
            runId,
            conversationId,
            answer: outcome.answer,
            response: outcome.response,
            iterations: outcome.iterations,
            toolCalls: outcome.toolCalls,
            usage: outcome.usage,
            ...(shareId !== undefined && { shareId }),
          });
        } finally {
          try {
            await acquired.data.release();
          } catch (error) {
            console.error('[orchestrator] Failed to release lock:', error);
          }
        }
      } finally {
        run.dispose();
      }
    },
  };
}
