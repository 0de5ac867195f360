/**
 * ShareService Database Adapter
 * Implements ShareServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { ShareRecord } from '@/types/index.js';
import { terminalAnswerSchema } from '@/orchestrator/terminal.js';

import type { ShareServiceDb } from './share.service.js';

/**
 * Database row type
 */
const shareRowSchema = z.object({
  id: z.string(),
  answer: terminalAnswerSchema,
  conversation_key: z.string().nullable(),
  created_at: z.string(),
});

/**
 * Create ShareServiceDb implementation using Supabase
 */
export function createShareServiceDb(supabase: SupabaseClient): ShareServiceDb {
  return {
    async insertShare(record: ShareRecord): Promise<void> {
      const { error } = await supabase.from('shares').insert({
        id: record.id,
        answer: record.answer,
        conversation_key: record.conversationKey,
        created_at: record.createdAt.toISOString(),
      });

      if (error !== null) {
        throw new Error(`Failed to insert share: ${error.message}`);
      }
    },

    async getShare(id: string): Promise<ShareRecord | null> {
      const { data, error } = await supabase
        .from('shares')
        .select('*')
        .eq('id', id)
        .maybeSingle();

      if (error !== null) {
        throw new Error(`Failed to get share: ${error.message}`);
      }
      if (data === null) {
        return null;
      }

      const row = shareRowSchema.safeParse(data);
      if (!row.success) {
        throw new Error(`Corrupt share row ${id}: ${row.error.message}`);
      }

      return {
        id: row.data.id,
        answer: row.data.answer,
        conversationKey: row.data.conversation_key,
        createdAt: new Date(row.data.created_at),
      };
    },
  };
}
