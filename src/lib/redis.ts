/**
 * Upstash Redis Client Configuration
 * Backs the distributed conversation lock and rate limiting
 */

import { Redis } from '@upstash/redis';

import type { LeaseClient } from '@/orchestrator/conversation-lock.js';

export interface RedisConfig {
  url: string;
  token: string;
}

let redisInstance: Redis | null = null;

/**
 * Get the Redis client instance (lazy initialization)
 */
export function getRedis(config: RedisConfig): Redis {
  if (redisInstance === null) {
    redisInstance = new Redis({
      url: config.url,
      token: config.token,
    });
  }
  return redisInstance;
}

/**
 * Compare-and-delete, so a lease that expired and was taken over by
 * another owner is never released by the previous one
 */
const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

/**
 * Lease operations for the conversation lock
 */
export function createUpstashLeaseClient(redis: Redis): LeaseClient {
  return {
    async setIfAbsent(key, value, ttlMs) {
      const result = await redis.set(key, value, { nx: true, px: ttlMs });
      return result === 'OK';
    },

    async deleteIfEquals(key, value) {
      await redis.eval(RELEASE_SCRIPT, [key], [value]);
    },
  };
}
