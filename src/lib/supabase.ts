/**
 * Supabase Client Configuration
 * Service-role client used by the persistence adapters and for verifying
 * access tokens
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseConfig {
  url: string;
  serviceKey: string;
}

/**
 * Create a Supabase admin client that bypasses RLS
 * NEVER expose this to user-facing code
 */
export function createSupabaseAdmin(config: SupabaseConfig): SupabaseClient {
  return createClient(config.url, config.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
