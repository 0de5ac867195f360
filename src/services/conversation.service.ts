/**
 * ConversationService Implementation
 *
 * Purpose: Conversation state persistence behind a store interface
 * Owns: conversations, conversation_messages
 *
 * CRITICAL: Conversations are append-only. The orchestrator is the single
 * writer and appends a whole turn with one call. Only the title can change.
 */

import { z } from 'zod';

import type {
  ActorContext,
  ConversationListPosition,
  ConversationState,
  ConversationSummary,
  Message,
  PaginatedResult,
  PaginationParams,
  Result,
} from '@/types/index.js';
import {
  success,
  failure,
  appendToState,
  conversationNamespace,
  createConversationState,
  defaultTitle,
  scopeConversationKey,
  splitConversationKey,
  MAX_TITLE_LENGTH,
} from '@/types/index.js';

/**
 * Conversation State Store
 * Keys are scoped (`namespace:conversationId`)
 */
export interface ConversationStore {
  /** Load a conversation; null when it does not exist yet */
  load(key: string): Promise<ConversationState | null>;

  /** Append messages atomically, in order */
  append(key: string, messages: Message[]): Promise<void>;

  /** Conversations of a namespace, most recently updated first */
  list(
    namespace: string,
    options: { limit: number; after?: ConversationListPosition }
  ): Promise<ConversationSummary[]>;

  /** Set the title; false when the conversation does not exist */
  setTitle(key: string, title: string): Promise<boolean>;
}

/**
 * ConversationService interface
 */
export interface ConversationService {
  getHistory(
    actor: ActorContext,
    conversationId: string
  ): Promise<Result<ConversationState>>;

  listConversations(
    actor: ActorContext,
    params: PaginationParams
  ): Promise<Result<PaginatedResult<ConversationSummary>>>;

  renameConversation(
    actor: ActorContext,
    conversationId: string,
    title: string
  ): Promise<Result<{ conversationId: string; title: string }>>;
}

// ─────────────────────────────────────────────────────────────
// LIST CURSORS
// ─────────────────────────────────────────────────────────────

const positionSchema = z.object({
  updatedAt: z.string().min(1),
  conversationId: z.string().min(1),
});

/**
 * Opaque cursor for the position after a summary
 */
export function encodeListCursor(position: ConversationListPosition): string {
  return Buffer.from(
    JSON.stringify({
      updatedAt: position.updatedAt,
      conversationId: position.conversationId,
    })
  ).toString('base64url');
}

export function decodeListCursor(
  cursor: string
): ConversationListPosition | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(cursor, 'base64url').toString('utf8'));
  } catch {
    return null;
  }
  const position = positionSchema.safeParse(parsed);
  return position.success ? position.data : null;
}

/**
 * Strict list order: updatedAt, then conversationId, both descending
 */
function comesAfter(
  summary: ConversationSummary,
  position: ConversationListPosition
): boolean {
  if (summary.updatedAt !== position.updatedAt) {
    return summary.updatedAt < position.updatedAt;
  }
  return summary.conversationId < position.conversationId;
}

function newestFirst(a: ConversationSummary, b: ConversationSummary): number {
  if (a.updatedAt !== b.updatedAt) {
    return a.updatedAt < b.updatedAt ? 1 : -1;
  }
  if (a.conversationId === b.conversationId) {
    return 0;
  }
  return a.conversationId < b.conversationId ? 1 : -1;
}

// ─────────────────────────────────────────────────────────────
// IN-MEMORY STORE
// ─────────────────────────────────────────────────────────────

interface StoredConversation {
  state: ConversationState;
  title: string | null;
}

function summarise(
  key: string,
  stored: StoredConversation
): ConversationSummary | null {
  const { messages } = stored.state;
  const first = messages[0];
  const last = messages[messages.length - 1];
  if (!first || !last) {
    return null;
  }
  const firstQuery = messages.find((message) => message.role === 'user');
  return {
    conversationId: splitConversationKey(key).conversationId,
    title:
      stored.title ??
      (firstQuery?.role === 'user' ? defaultTitle(firstQuery.content) : ''),
    createdAt: first.createdAt,
    updatedAt: last.createdAt,
  };
}

/**
 * Create an in-memory conversation store (tests and local development)
 */
export function createInMemoryConversationStore(): ConversationStore {
  const conversations = new Map<string, StoredConversation>();

  return {
    load(key) {
      const stored = conversations.get(key);
      return Promise.resolve(stored ? structuredClone(stored.state) : null);
    },

    append(key, messages) {
      const current = conversations.get(key) ?? {
        state: createConversationState(key),
        title: null,
      };
      conversations.set(key, {
        state: appendToState(current.state, structuredClone(messages)),
        title: current.title,
      });
      return Promise.resolve();
    },

    list(namespace, options) {
      const summaries = [...conversations.entries()]
        .filter(([key]) => splitConversationKey(key).namespace === namespace)
        .flatMap(([key, stored]) => summarise(key, stored) ?? [])
        .filter(
          (summary) =>
            options.after === undefined || comesAfter(summary, options.after)
        )
        .sort(newestFirst);
      return Promise.resolve(summaries.slice(0, options.limit));
    },

    setTitle(key, title) {
      const stored = conversations.get(key);
      if (!stored) {
        return Promise.resolve(false);
      }
      conversations.set(key, { ...stored, title });
      return Promise.resolve(true);
    },
  };
}

/**
 * Create ConversationService instance
 */
export function createConversationService(deps: {
  store: ConversationStore;
}): ConversationService {
  const { store } = deps;

  return {
    /**
     * Read the history of one of the actor's conversations
     */
    async getHistory(
      actor: ActorContext,
      conversationId: string
    ): Promise<Result<ConversationState>> {
      const key = scopeConversationKey(actor, conversationId);

      let state: ConversationState | null;
      try {
        state = await store.load(key);
      } catch (error) {
        console.error('[conversation] Failed to load history:', error);
        return failure('STATE_STORE_ERROR', 'Failed to load conversation');
      }

      if (state === null) {
        return failure('NOT_FOUND', 'Conversation not found');
      }
      return success(state);
    },

    /**
     * One page of the actor's conversations, most recently updated first.
     * Anonymous callers share a namespace and cannot list it.
     */
    async listConversations(
      actor: ActorContext,
      params: PaginationParams
    ): Promise<Result<PaginatedResult<ConversationSummary>>> {
      if (actor.type === 'anonymous') {
        return failure('FORBIDDEN', 'Sign in to list conversations');
      }

      let after: ConversationListPosition | undefined;
      if (params.cursor !== undefined) {
        const position = decodeListCursor(params.cursor);
        if (position === null) {
          return failure('VALIDATION_ERROR', 'Invalid cursor');
        }
        after = position;
      }

      let rows: ConversationSummary[];
      try {
        // Fetch one more than limit to determine hasMore
        rows = await store.list(conversationNamespace(actor), {
          limit: params.limit + 1,
          ...(after && { after }),
        });
      } catch (error) {
        console.error('[conversation] Failed to list conversations:', error);
        return failure('STATE_STORE_ERROR', 'Failed to list conversations');
      }

      const hasMore = rows.length > params.limit;
      const items = rows.slice(0, params.limit);
      const result: PaginatedResult<ConversationSummary> = { items, hasMore };
      const lastItem = items[items.length - 1];
      if (hasMore && lastItem !== undefined) {
        result.nextCursor = encodeListCursor(lastItem);
      }
      return success(result);
    },

    async renameConversation(
      actor: ActorContext,
      conversationId: string,
      title: string
    ): Promise<Result<{ conversationId: string; title: string }>> {
      const trimmed = title.trim();
      if (trimmed.length === 0 || trimmed.length > MAX_TITLE_LENGTH) {
        return failure(
          'VALIDATION_ERROR',
          `title must be 1 to ${MAX_TITLE_LENGTH} characters`
        );
      }

      let updated: boolean;
      try {
        updated = await store.setTitle(
          scopeConversationKey(actor, conversationId),
          trimmed
        );
      } catch (error) {
        console.error('[conversation] Failed to rename conversation:', error);
        return failure('STATE_STORE_ERROR', 'Failed to rename conversation');
      }

      if (!updated) {
        return failure('NOT_FOUND', 'Conversation not found');
      }
      return success({ conversationId, title: trimmed });
    },
  };
}
