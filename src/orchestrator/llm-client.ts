/**
 * LLM Client Implementation
 *
 * Wraps the OpenAI SDK against any OpenAI-compatible endpoint
 * (OpenRouter by default)
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';

import type {
  LLMClient,
  LLMMessage,
  LLMResponse,
} from '@/types/index.js';

/**
 * OpenRouter base URL
 */
const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/**
 * LLM Client configuration options
 */
export interface LLMClientConfig {
  /** API key (required) */
  apiKey: string;

  /** Base URL override (default: OpenRouter) */
  baseURL?: string;

  /** Site URL for OpenRouter attribution */
  siteUrl?: string;

  /** Site name for OpenRouter attribution */
  siteName?: string;

  /** Default request timeout in milliseconds */
  timeout?: number;
}

type FinishReason = LLMResponse['choices'][number]['finish_reason'];

function toFinishReason(
  reason: ChatCompletion.Choice['finish_reason']
): FinishReason {
  // Legacy function calling is reported as tool calls
  return reason === 'function_call' ? 'tool_calls' : reason;
}

/**
 * Convert our LLMMessage to OpenAI's ChatCompletionMessageParam
 */
function toOpenAIMessage(msg: LLMMessage): ChatCompletionMessageParam {
  switch (msg.role) {
    case 'system':
      return { role: 'system', content: msg.content };
    case 'user':
      return { role: 'user', content: msg.content };
    case 'assistant':
      return {
        role: 'assistant',
        content: msg.content,
        ...(msg.tool_calls &&
          msg.tool_calls.length > 0 && {
            tool_calls: msg.tool_calls.map((tc) => ({
              id: tc.id,
              type: 'function' as const,
              function: {
                name: tc.function.name,
                arguments: tc.function.arguments,
              },
            })),
          }),
      };
    case 'tool':
      return {
        role: 'tool',
        content: msg.content,
        tool_call_id: msg.tool_call_id ?? '',
      };
  }
}

/**
 * Create an LLM client
 */
export function createLLMClient(config: LLMClientConfig): LLMClient {
  // Validate API key
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  // Build default headers for OpenRouter
  const defaultHeaders: Record<string, string> = {};
  if (config.siteUrl) {
    defaultHeaders['HTTP-Referer'] = config.siteUrl;
  }
  if (config.siteName) {
    defaultHeaders['X-Title'] = config.siteName;
  }

  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL ?? OPENROUTER_BASE_URL,
    defaultHeaders,
    timeout: config.timeout ?? 120000,
    // The orchestrator owns retries through its iteration budget
    maxRetries: 0,
  });

  return {
    async complete(request, options): Promise<LLMResponse> {
      const response = await openai.chat.completions.create(
        {
          model: request.model,
          messages: request.messages.map(toOpenAIMessage),
          ...(request.tools &&
            request.tools.length > 0 && { tools: request.tools }),
          ...(request.tool_choice && { tool_choice: request.tool_choice }),
          ...(request.max_tokens !== undefined && {
            max_tokens: request.max_tokens,
          }),
          ...(request.temperature !== undefined && {
            temperature: request.temperature,
          }),
          stream: false,
        },
        {
          ...(options?.signal && { signal: options.signal }),
          ...(options?.timeoutMs !== undefined && {
            timeout: options.timeoutMs,
          }),
        }
      );

      // Map OpenAI response to our LLMResponse type
      return {
        id: response.id,
        model: response.model,
        choices: response.choices.map((choice) => ({
          index: choice.index,
          message: {
            role: 'assistant' as const,
            content: choice.message.content ?? '',
            ...(choice.message.tool_calls && {
              tool_calls: choice.message.tool_calls.map((tc) => ({
                id: tc.id,
                type: 'function' as const,
                function: {
                  name: tc.function.name,
                  arguments: tc.function.arguments,
                },
              })),
            }),
          },
          finish_reason: toFinishReason(choice.finish_reason),
        })),
        usage: {
          prompt_tokens: response.usage?.prompt_tokens ?? 0,
          completion_tokens: response.usage?.completion_tokens ?? 0,
          total_tokens: response.usage?.total_tokens ?? 0,
        },
      };
    },
  };
}
