/**
 * Conversation Store Database Adapter
 * Implements ConversationStore using Supabase
 *
 * Each message is one row of `conversation_messages`; order is the
 * row's identity column. A turn is written with a single insert.
 * `conversations` holds one row per conversation for listing and titles.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type {
  ConversationState,
  ConversationSummary,
  Message,
  ToolResult,
} from '@/types/index.js';
import {
  appendToState,
  createConversationState,
  defaultTitle,
  splitConversationKey,
} from '@/types/index.js';
import { terminalAnswerSchema } from '@/orchestrator/terminal.js';

import type { ConversationStore } from './conversation.service.js';

const toolResultSchema: z.ZodType<ToolResult, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('status', [
    z.object({
      callId: z.string(),
      tool: z.string(),
      durationMs: z.number(),
      status: z.literal('success'),
      output: z.record(z.unknown()),
    }),
    z.object({
      callId: z.string(),
      tool: z.string(),
      durationMs: z.number(),
      status: z.literal('failure'),
      reason: z.enum(['INVALID_TOOL_ARGUMENTS', 'TOOL_TIMEOUT', 'TOOL_FAILURE']),
      message: z.string(),
    }),
  ]);

const messageSchema: z.ZodType<Message, z.ZodTypeDef, unknown> =
  z.discriminatedUnion('role', [
    z.object({
      role: z.literal('user'),
      content: z.string(),
      correction: z.literal(true).optional(),
      runId: z.string(),
      createdAt: z.string(),
    }),
    z.object({
      role: z.literal('assistant'),
      content: z.string(),
      toolCalls: z.array(
        z.object({
          id: z.string(),
          name: z.string(),
          args: z.record(z.unknown()),
        })
      ),
      answer: terminalAnswerSchema.optional(),
      runId: z.string(),
      createdAt: z.string(),
    }),
    z.object({
      role: z.literal('tool-result'),
      result: toolResultSchema,
      runId: z.string(),
      createdAt: z.string(),
    }),
  ]);

/**
 * Database row type
 */
const messageRowSchema = z.object({
  id: z.number(),
  conversation_key: z.string(),
  role: z.string(),
  run_id: z.string(),
  message: messageSchema,
  created_at: z.string(),
});

const conversationRowSchema = z.object({
  conversation_id: z.string(),
  title: z.string().nullable(),
  first_query: z.string(),
  created_at: z.string(),
  updated_at: z.string(),
});

type ConversationRow = z.infer<typeof conversationRowSchema>;

function mapRowToSummary(row: ConversationRow): ConversationSummary {
  return {
    conversationId: row.conversation_id,
    title: row.title ?? defaultTitle(row.first_query),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Create ConversationStore implementation using Supabase
 */
export function createConversationStoreDb(
  supabase: SupabaseClient
): ConversationStore {
  return {
    /**
     * Load all messages of a conversation in insertion order
     */
    async load(key: string): Promise<ConversationState | null> {
      const { data, error } = await supabase
        .from('conversation_messages')
        .select('*')
        .eq('conversation_key', key)
        .order('id', { ascending: true });

      if (error !== null) {
        throw new Error(`Failed to load conversation: ${error.message}`);
      }

      const rows = z.array(messageRowSchema).safeParse(data ?? []);
      if (!rows.success) {
        throw new Error(
          `Corrupt conversation rows for ${key}: ${rows.error.message}`
        );
      }
      if (rows.data.length === 0) {
        return null;
      }

      return appendToState(
        createConversationState(key),
        rows.data.map((row) => row.message)
      );
    },

    /**
     * Append a turn with one insert statement, then move the
     * conversation's updated_at
     */
    async append(key: string, messages: Message[]): Promise<void> {
      const first = messages[0];
      const last = messages[messages.length - 1];
      if (!first || !last) {
        return;
      }

      // Existing rows keep their title, first query and created_at
      const { namespace, conversationId } = splitConversationKey(key);
      const { error: indexError } = await supabase.from('conversations').upsert(
        {
          key,
          namespace,
          conversation_id: conversationId,
          first_query: first.role === 'user' ? first.content : '',
          created_at: first.createdAt,
          updated_at: first.createdAt,
        },
        { onConflict: 'key', ignoreDuplicates: true }
      );
      if (indexError !== null) {
        throw new Error(`Failed to record conversation: ${indexError.message}`);
      }

      const { error } = await supabase.from('conversation_messages').insert(
        messages.map((message) => ({
          conversation_key: key,
          role: message.role,
          run_id: message.runId,
          message,
          created_at: message.createdAt,
        }))
      );

      if (error !== null) {
        throw new Error(`Failed to append messages: ${error.message}`);
      }

      const { error: touchError } = await supabase
        .from('conversations')
        .update({ updated_at: last.createdAt })
        .eq('key', key);
      if (touchError !== null) {
        throw new Error(`Failed to update conversation: ${touchError.message}`);
      }
    },

    /**
     * Keyset pagination over (updated_at, conversation_id) descending
     */
    async list(namespace, options): Promise<ConversationSummary[]> {
      let query = supabase
        .from('conversations')
        .select('conversation_id, title, first_query, created_at, updated_at')
        .eq('namespace', namespace);

      if (options.after) {
        const { updatedAt, conversationId } = options.after;
        query = query.or(
          `updated_at.lt."${updatedAt}",and(updated_at.eq."${updatedAt}",conversation_id.lt."${conversationId}")`
        );
      }

      const { data, error } = await query
        .order('updated_at', { ascending: false })
        .order('conversation_id', { ascending: false })
        .limit(options.limit);

      if (error !== null) {
        throw new Error(`Failed to list conversations: ${error.message}`);
      }

      const rows = z.array(conversationRowSchema).safeParse(data ?? []);
      if (!rows.success) {
        throw new Error(`Corrupt conversation rows: ${rows.error.message}`);
      }
      return rows.data.map(mapRowToSummary);
    },

    async setTitle(key: string, title: string): Promise<boolean> {
      const { data, error } = await supabase
        .from('conversations')
        .update({ title })
        .eq('key', key)
        .select('key');

      if (error !== null) {
        throw new Error(`Failed to rename conversation: ${error.message}`);
      }
      return (data ?? []).length > 0;
    },
  };
}
