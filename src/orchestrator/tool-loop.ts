/**
 * Tool Loop Implementation
 *
 * Bounded state machine for one orchestration run:
 * awaiting-llm -> dispatching-tools -> awaiting-llm ... -> terminal | failed
 *
 * Each tool turn is committed as a single append (assistant message plus
 * every tool result, in request order). A turn interrupted by cancellation
 * or the run deadline is never written.
 */

import { z } from 'zod';

import type {
  ConversationState,
  LLMClient,
  LLMRequest,
  LLMResponse,
  LLMToolCall,
  Message,
  Mode,
  OrchestrationErrorCode,
  OrchestratorConfig,
  RequestContext,
  ResponsePayload,
  TerminalAnswer,
  ToolCallRequest,
  ToolCallSummary,
  ToolResult,
  TurnEvent,
  TurnEventSink,
  LoopState,
} from '@/types/index.js';
import { appendToState } from '@/types/index.js';
import type { ToolExecutor } from '@/tools/index.js';
import { abortable, linkSignals } from '@/lib/abort.js';
import {
  assembleAnswer,
  collectToolResults,
  degradeAnswer,
} from '@/assemblers/index.js';

import type { PromptBuilder } from './prompt-builder.js';
import { parseTerminalAnswer } from './terminal.js';

/**
 * Abort reason used when the whole-run deadline passes
 */
export class RunDeadlineError extends Error {
  constructor(ms: number) {
    super(`Run exceeded its ${ms}ms deadline`);
    this.name = 'RunDeadlineError';
  }
}

/**
 * Abort reason used when a single LLM call times out
 */
class LLMTimeoutError extends Error {
  constructor(ms: number) {
    super(`LLM call timed out after ${ms}ms`);
    this.name = 'LLMTimeoutError';
  }
}

/**
 * Map an aborted run signal to its failure code
 */
export function abortCode(
  signal: AbortSignal
): 'ORCHESTRATION_TIMEOUT' | 'ORCHESTRATION_CANCELLED' {
  return signal.reason instanceof RunDeadlineError
    ? 'ORCHESTRATION_TIMEOUT'
    : 'ORCHESTRATION_CANCELLED';
}

/**
 * Input for a tool loop run
 */
export interface ToolLoopInput {
  runId: string;
  requestId: string;
  actorId: string | null;
  mode: Mode;
  /** State after the user message has been appended */
  state: ConversationState;
  context?: RequestContext;
  /** Run signal: caller cancellation and run deadline */
  signal: AbortSignal;
}

export interface ToolLoopUsage {
  inputTokens: number;
  outputTokens: number;
}

interface LoopStats {
  iterations: number;
  toolCalls: ToolCallSummary[];
  usage: ToolLoopUsage;
}

export type ToolLoopResult =
  | (LoopStats & {
      outcome: 'terminal';
      answer: TerminalAnswer;
      response: ResponsePayload;
    })
  | (LoopStats & {
      outcome: 'failed';
      code: OrchestrationErrorCode;
      message: string;
      details?: Record<string, unknown>;
      partial?: TerminalAnswer;
    });

/**
 * Tool Loop interface
 */
export interface ToolLoop {
  run(input: ToolLoopInput): Promise<ToolLoopResult>;
}

/**
 * Dependencies for tool loop
 */
export interface ToolLoopDeps {
  llmClient: LLMClient;
  promptBuilder: PromptBuilder;
  /** Executor restricted to the run's mode */
  toolExecutor: ToolExecutor;
  /** Append messages to the conversation store */
  commit: (messages: Message[]) => Promise<void>;
  eventSink: TurnEventSink;
  config: OrchestratorConfig;
}

/**
 * A call as requested by the LLM, with arguments decoded. Calls whose
 * arguments could not be decoded carry a ready-made failure.
 */
interface DecodedCall {
  request: ToolCallRequest;
  rejected?: ToolResult;
}

const toolArgsSchema = z.record(z.string(), z.unknown());

function decodeToolCall(call: LLMToolCall): DecodedCall {
  const raw = call.function.arguments.trim();
  const request: ToolCallRequest = {
    id: call.id,
    name: call.function.name,
    args: {},
  };
  if (raw === '') {
    return { request };
  }

  const reject = (message: string): DecodedCall => ({
    request,
    rejected: {
      callId: call.id,
      tool: call.function.name,
      status: 'failure',
      reason: 'INVALID_TOOL_ARGUMENTS',
      message,
      durationMs: 0,
    },
  });

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : 'invalid JSON';
    return reject(`Arguments are not valid JSON: ${detail}`);
  }
  const args = toolArgsSchema.safeParse(parsed);
  if (!args.success) {
    return reject('Arguments must be a JSON object');
  }
  return { request: { ...request, args: args.data } };
}

/**
 * Ids that are empty, repeated within the turn or already used earlier in
 * the conversation get a turn and position suffix, so every result pairs
 * with exactly one call.
 */
function uniqueCallIds(
  calls: LLMToolCall[],
  taken: Iterable<string>,
  turn: number
): LLMToolCall[] {
  const used = new Set(taken);
  return calls.map((call, index) => {
    let id = call.id;
    if (id === '' || used.has(id)) {
      id = `${call.id || 'call'}_${turn}_${index}`;
    }
    used.add(id);
    return id === call.id ? call : { ...call, id };
  });
}

function summarise(
  request: ToolCallRequest,
  result: ToolResult
): ToolCallSummary {
  return {
    callId: request.id,
    toolName: request.name,
    args: request.args,
    status: result.status,
    ...(result.status === 'failure' && { reason: result.reason }),
    durationMs: result.durationMs,
  };
}

function correctionMessage(error: string): string {
  return (
    'Your last reply could not be used as the final answer: ' +
    `${error}\n` +
    'Reply again with only the JSON object described in FINAL ANSWER FORMAT.'
  );
}

/**
 * Create a tool loop instance
 */
export function createToolLoop(deps: ToolLoopDeps): ToolLoop {
  const { llmClient, promptBuilder, toolExecutor, commit, eventSink, config } =
    deps;

  return {
    async run(input: ToolLoopInput): Promise<ToolLoopResult> {
      const { runId, mode, signal } = input;
      let state = input.state;
      let iterations = 0;
      let correctionUsed = false;
      const toolCalls: ToolCallSummary[] = [];
      const usage: ToolLoopUsage = { inputTokens: 0, outputTokens: 0 };

      const stats = (): LoopStats => ({ iterations, toolCalls, usage });

      async function emit(
        turn: number,
        loopState: LoopState,
        fields: Partial<
          Pick<
            TurnEvent,
            | 'toolCalls'
            | 'toolResults'
            | 'outcome'
            | 'errorCode'
            | 'answerKind'
            | 'truncatedCount'
          >
        >
      ): Promise<void> {
        const event: TurnEvent = {
          runId,
          requestId: input.requestId,
          actorId: input.actorId,
          conversationKey: state.id,
          mode,
          turn,
          state: loopState,
          toolCalls: [],
          toolResults: [],
          truncatedCount: 0,
          ...fields,
          timestamp: new Date().toISOString(),
        };
        try {
          await eventSink.record(event);
        } catch (error) {
          console.error('[tool-loop] Failed to record turn event:', error);
        }
      }

      async function fail(
        turn: number,
        code: OrchestrationErrorCode,
        message: string,
        extra: {
          details?: Record<string, unknown>;
          partial?: TerminalAnswer;
        } = {}
      ): Promise<ToolLoopResult> {
        await emit(turn, 'failed', { outcome: 'failed', errorCode: code });
        return { outcome: 'failed', code, message, ...extra, ...stats() };
      }

      function aborted(turn: number): Promise<ToolLoopResult> {
        const code = abortCode(signal);
        return fail(
          turn,
          code,
          code === 'ORCHESTRATION_TIMEOUT'
            ? 'Run exceeded its deadline'
            : 'Run was cancelled'
        );
      }

      async function append(messages: Message[]): Promise<void> {
        await commit(messages);
        state = appendToState(state, messages);
      }

      while (iterations < config.maxIterations) {
        if (signal.aborted) {
          return aborted(iterations);
        }
        iterations++;
        const turn = iterations;

        // ── awaiting-llm ────────────────────────────────────────
        const prompt = promptBuilder.build(state, mode, {
          maxInputTokens: config.maxInputTokens,
          ...(input.context && { context: input.context }),
        });

        const request: LLMRequest = {
          model: config.model,
          messages: prompt.messages,
          ...(prompt.tools.length > 0 && {
            tools: prompt.tools,
            tool_choice: 'auto' as const,
          }),
          max_tokens: config.maxOutputTokens,
          temperature: config.temperature,
        };

        const llmCall = linkSignals([signal], {
          ms: config.llmCallTimeout,
          reason: () => new LLMTimeoutError(config.llmCallTimeout),
        });
        let response: LLMResponse;
        try {
          response = await abortable(
            llmClient.complete(request, {
              signal: llmCall.signal,
              timeoutMs: config.llmCallTimeout,
            }),
            llmCall.signal
          );
        } catch (error) {
          if (signal.aborted) {
            return aborted(turn);
          }
          const message =
            error instanceof Error ? error.message : 'Unknown LLM error';
          return fail(turn, 'LLM_ERROR', message);
        } finally {
          llmCall.dispose();
        }

        usage.inputTokens += response.usage.prompt_tokens;
        usage.outputTokens += response.usage.completion_tokens;

        const choice = response.choices[0];
        if (!choice) {
          return fail(turn, 'LLM_ERROR', 'LLM returned no choices');
        }
        const reply = choice.message;
        const createdAt = new Date().toISOString();

        // ── dispatching-tools ───────────────────────────────────
        if (reply.tool_calls && reply.tool_calls.length > 0) {
          const decoded = uniqueCallIds(
            reply.tool_calls,
            Object.keys(state.toolResults),
            turn
          ).map(decodeToolCall);
          const requests = decoded.map((call) => call.request);

          // Results keep request order whatever the completion order
          const results = await Promise.all(
            decoded.map(
              (call): Promise<ToolResult> =>
                call.rejected
                  ? Promise.resolve(call.rejected)
                  : toolExecutor.execute(call.request, {
                      requestId: input.requestId,
                      conversationKey: state.id,
                      ...(input.context?.clientIp !== undefined && {
                        clientIp: input.context.clientIp,
                      }),
                      signal,
                    })
            )
          );

          if (signal.aborted) {
            return aborted(turn);
          }

          const messages: Message[] = [
            {
              role: 'assistant',
              content: reply.content,
              toolCalls: requests,
              runId,
              createdAt,
            },
            ...results.map(
              (result): Message => ({
                role: 'tool-result',
                result,
                runId,
                createdAt,
              })
            ),
          ];
          try {
            await append(messages);
          } catch (error) {
            console.error('[tool-loop] Failed to append tool turn:', error);
            return fail(turn, 'STATE_STORE_ERROR', 'Failed to save tool turn');
          }

          requests.forEach((call, index) => {
            const result = results[index];
            if (result) {
              toolCalls.push(summarise(call, result));
            }
          });

          await emit(turn, 'dispatching-tools', {
            toolCalls: requests,
            toolResults: results.map((result) => ({
              callId: result.callId,
              tool: result.tool,
              status: result.status,
              ...(result.status === 'failure' && { reason: result.reason }),
              durationMs: result.durationMs,
            })),
            truncatedCount: prompt.truncatedCount,
          });
          continue;
        }

        // ── terminal ────────────────────────────────────────────
        const parsed = parseTerminalAnswer(mode, reply.content);
        if (!parsed.success) {
          if (correctionUsed) {
            return fail(
              turn,
              'MALFORMED_TERMINAL_ANSWER',
              parsed.error.message
            );
          }
          // No iteration left for the correction
          if (iterations >= config.maxIterations) {
            break;
          }
          correctionUsed = true;
          try {
            await append([
              {
                role: 'assistant',
                content: reply.content,
                toolCalls: [],
                runId,
                createdAt,
              },
              {
                role: 'user',
                content: correctionMessage(parsed.error.message),
                correction: true,
                runId,
                createdAt,
              },
            ]);
          } catch (error) {
            console.error('[tool-loop] Failed to append correction:', error);
            return fail(turn, 'STATE_STORE_ERROR', 'Failed to save correction');
          }
          await emit(turn, 'awaiting-llm', {
            errorCode: 'MALFORMED_TERMINAL_ANSWER',
            truncatedCount: prompt.truncatedCount,
          });
          continue;
        }

        const answer = parsed.data;
        const assembled = assembleAnswer(answer, collectToolResults(state));
        if (!assembled.success) {
          return fail(
            turn,
            'UNRESOLVED_REFERENCE',
            assembled.error.message,
            assembled.error.details ? { details: assembled.error.details } : {}
          );
        }

        try {
          await append([
            {
              role: 'assistant',
              content: reply.content,
              toolCalls: [],
              answer,
              runId,
              createdAt,
            },
          ]);
        } catch (error) {
          console.error('[tool-loop] Failed to append terminal answer:', error);
          return fail(turn, 'STATE_STORE_ERROR', 'Failed to save answer');
        }

        await emit(turn, 'terminal', {
          outcome: 'terminal',
          answerKind: answer.kind,
          truncatedCount: prompt.truncatedCount,
        });
        return {
          outcome: 'terminal',
          answer,
          response: assembled.data,
          ...stats(),
        };
      }

      const partial = degradeAnswer(mode, collectToolResults(state));
      return fail(
        iterations,
        'ORCHESTRATION_EXHAUSTED',
        `No final answer within ${config.maxIterations} iterations`,
        partial ? { partial } : {}
      );
    },
  };
}
