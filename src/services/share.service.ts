/**
 * ShareService Implementation
 *
 * Purpose: Write-once share records for terminal answers
 * Owns: shares
 *
 * Records are never updated or deleted. Decoding returns a copy that is
 * structurally equal to the encoded answer.
 */

import { nanoid } from 'nanoid';

import type {
  ActorContext,
  EncodeShareParams,
  Result,
  ShareRecord,
  TerminalAnswer,
} from '@/types/index.js';
import {
  success,
  failure,
  latestAnswer,
  scopeConversationKey,
} from '@/types/index.js';

import type { ConversationStore } from './conversation.service.js';

/** Length of generated share ids */
const SHARE_ID_LENGTH = 12;

/**
 * Database abstraction interface for ShareService
 */
export interface ShareServiceDb {
  insertShare(record: ShareRecord): Promise<void>;
  getShare(id: string): Promise<ShareRecord | null>;
}

/**
 * ShareService interface
 */
export interface ShareService {
  /** Persist an answer and return its share id */
  encode(params: EncodeShareParams): Promise<Result<string>>;

  /** Resolve a share id to its answer */
  decode(shareId: string): Promise<Result<TerminalAnswer>>;

  /** Share the latest terminal answer of one of the actor's conversations */
  shareConversation(
    actor: ActorContext,
    conversationId: string
  ): Promise<Result<{ shareId: string }>>;
}

/**
 * Create an in-memory share store (tests and local development)
 */
export function createInMemoryShareDb(): ShareServiceDb {
  const shares = new Map<string, ShareRecord>();

  return {
    insertShare(record) {
      if (shares.has(record.id)) {
        return Promise.reject(new Error(`Share ${record.id} already exists`));
      }
      shares.set(record.id, structuredClone(record));
      return Promise.resolve();
    },

    getShare(id) {
      const record = shares.get(id);
      return Promise.resolve(record ? structuredClone(record) : null);
    },
  };
}

/**
 * Create ShareService instance
 */
export function createShareService(deps: {
  db: ShareServiceDb;
  conversationStore: Pick<ConversationStore, 'load'>;
  generateId?: () => string;
}): ShareService {
  const { db, conversationStore } = deps;
  const generateId = deps.generateId ?? (() => nanoid(SHARE_ID_LENGTH));

  async function encode(params: EncodeShareParams): Promise<Result<string>> {
    const record: ShareRecord = {
      id: generateId(),
      answer: structuredClone(params.answer),
      conversationKey: params.conversationKey ?? null,
      createdAt: new Date(),
    };

    try {
      await db.insertShare(record);
    } catch (error) {
      console.error('[share] Failed to create share:', error);
      return failure('INTERNAL_ERROR', 'Failed to create share');
    }
    return success(record.id);
  }

  return {
    encode,

    async decode(shareId: string): Promise<Result<TerminalAnswer>> {
      let record: ShareRecord | null;
      try {
        record = await db.getShare(shareId);
      } catch (error) {
        console.error('[share] Failed to read share:', error);
        return failure('INTERNAL_ERROR', 'Failed to read share');
      }

      if (record === null) {
        return failure('NOT_FOUND', 'Share not found');
      }
      return success(structuredClone(record.answer));
    },

    async shareConversation(
      actor: ActorContext,
      conversationId: string
    ): Promise<Result<{ shareId: string }>> {
      const key = scopeConversationKey(actor, conversationId);

      let answer: TerminalAnswer | undefined;
      try {
        const state = await conversationStore.load(key);
        answer = state ? latestAnswer(state) : undefined;
      } catch (error) {
        console.error('[share] Failed to load conversation:', error);
        return failure('STATE_STORE_ERROR', 'Failed to load conversation');
      }

      if (answer === undefined) {
        return failure('NOT_FOUND', 'Conversation has no answer to share');
      }

      const encoded = await encode({ answer, conversationKey: key });
      if (!encoded.success) {
        return encoded;
      }
      return success({ shareId: encoded.data });
    },
  };
}
