/**
 * Conversation Domain Types
 *
 * SCOPE: per-conversation message history and tool results
 *
 * CRITICAL: Conversations are append-only. The core never edits or deletes
 * a message; retention is the backing store's concern.
 */

import type { TerminalAnswer } from './answer.js';
import type { ToolCallRequest, ToolResult } from './tool.js';

interface MessageBase {
  /** Orchestration run that produced the message */
  runId: string;
  /** ISO timestamp */
  createdAt: string;
}

export interface UserMessage extends MessageBase {
  role: 'user';
  content: string;
  /** Set on schema-correction messages synthesised by the loop */
  correction?: true;
}

export interface AssistantMessage extends MessageBase {
  role: 'assistant';
  content: string;
  toolCalls: ToolCallRequest[];
  /** Present on the message that terminated a run */
  answer?: TerminalAnswer;
}

export interface ToolResultMessage extends MessageBase {
  role: 'tool-result';
  result: ToolResult;
}

export type Message = UserMessage | AssistantMessage | ToolResultMessage;

/**
 * Conversation state as seen by one orchestration run
 */
export interface ConversationState {
  /** Scoped conversation key (namespace:conversationId) */
  id: string;
  /** Ordered message history; insertion order is significant */
  messages: Message[];
  /** Tool results keyed by tool-call id */
  toolResults: Record<string, ToolResult>;
}

/**
 * Longest title derived from a conversation's first query
 */
export const MAX_TITLE_LENGTH = 80;

/**
 * One entry of an actor's conversation list
 */
export interface ConversationSummary {
  conversationId: string;
  /** Title set by the user, or the first query */
  title: string;
  /** createdAt of the first message */
  createdAt: string;
  /** createdAt of the latest message */
  updatedAt: string;
}

/**
 * Position after which a conversation list continues. Lists are ordered by
 * updatedAt, then conversationId, both descending.
 */
export interface ConversationListPosition {
  updatedAt: string;
  conversationId: string;
}

/**
 * Title shown for a conversation that was never renamed
 */
export function defaultTitle(firstQuery: string): string {
  const title = firstQuery.trim().replace(/\s+/g, ' ');
  return title.length > MAX_TITLE_LENGTH
    ? `${title.slice(0, MAX_TITLE_LENGTH - 1)}…`
    : title;
}

/**
 * Create an empty conversation state
 */
export function createConversationState(id: string): ConversationState {
  return { id, messages: [], toolResults: {} };
}

/**
 * Append messages to a state, keeping the tool-result index in sync
 */
export function appendToState(
  state: ConversationState,
  messages: Message[]
): ConversationState {
  const toolResults = { ...state.toolResults };
  for (const message of messages) {
    if (message.role === 'tool-result') {
      toolResults[message.result.callId] = message.result;
    }
  }
  return {
    id: state.id,
    messages: [...state.messages, ...messages],
    toolResults,
  };
}

/**
 * Latest terminal answer recorded in a conversation, if any
 */
export function latestAnswer(
  state: ConversationState
): TerminalAnswer | undefined {
  for (let i = state.messages.length - 1; i >= 0; i--) {
    const message = state.messages[i];
    if (message?.role === 'assistant' && message.answer !== undefined) {
      return message.answer;
    }
  }
  return undefined;
}
