/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createSupabaseAdmin } from './supabase.js';
export type { SupabaseConfig } from './supabase.js';
export { getRedis, createUpstashLeaseClient } from './redis.js';
export type { RedisConfig } from './redis.js';
export { abortable, linkSignals } from './abort.js';
export type { LinkedController } from './abort.js';
