/**
 * AuditService Database Adapter
 * Implements AuditServiceDb interface using Supabase
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';

import type { AuditLogEntry, AuditServiceDb } from './audit.service.js';

const insertedRowSchema = z.object({ id: z.string() });

/**
 * Create AuditServiceDb implementation using Supabase
 */
export function createAuditServiceDb(supabase: SupabaseClient): AuditServiceDb {
  return {
    /**
     * Insert a single audit log
     */
    async insertLog(entry: AuditLogEntry): Promise<{ id: string }> {
      const { data, error } = await supabase
        .from('audit_logs')
        .insert({
          actor_id: entry.actorId,
          actor_type: entry.actorType,
          action: entry.action,
          resource_type: entry.resourceType,
          resource_id: entry.resourceId,
          details: entry.details,
          ip_address: entry.ipAddress,
          user_agent: entry.userAgent,
          request_id: entry.requestId,
        })
        .select('id')
        .single();

      if (error !== null) {
        throw new Error(`Failed to insert audit log: ${error.message}`);
      }

      const row = insertedRowSchema.safeParse(data);
      if (!row.success) {
        throw new Error('Audit log insert returned no id');
      }
      return { id: row.data.id };
    },
  };
}
