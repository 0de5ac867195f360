/**
 * Conversation Lock
 *
 * Serialises orchestration runs per conversation key. Runs on distinct
 * keys never contend. A run that cannot obtain the lock within the wait
 * budget fails instead of queueing forever.
 */

import { randomUUID } from 'node:crypto';
import { setTimeout as delay } from 'node:timers/promises';

import type { Result } from '@/types/index.js';
import { success, failure } from '@/types/index.js';

export interface LockHandle {
  /** Release the lock. Safe to call more than once. */
  release(): Promise<void>;
}

export interface AcquireOptions {
  /** Give up after this many milliseconds */
  waitMs: number;
  /** Abort waiting */
  signal?: AbortSignal;
}

/**
 * Failure codes:
 * - LOCK_TIMEOUT: not obtained within waitMs
 * - LOCK_ABORTED: the signal aborted while waiting
 * - LOCK_UNAVAILABLE: the backing store could not be reached
 */
export interface ConversationLock {
  acquire(key: string, options: AcquireOptions): Promise<Result<LockHandle>>;
}

// ─────────────────────────────────────────────────────────────
// IN-PROCESS LOCK
// ─────────────────────────────────────────────────────────────

/** Present while the key is held */
interface LockEntry {
  waiters: Array<() => void>;
}

/**
 * Create an in-process keyed lock. Waiters are served in FIFO order.
 */
export function createInMemoryConversationLock(): ConversationLock {
  const entries = new Map<string, LockEntry>();

  function handleFor(key: string): LockHandle {
    let released = false;
    return {
      release(): Promise<void> {
        if (released) {
          return Promise.resolve();
        }
        released = true;

        const entry = entries.get(key);
        if (entry) {
          const next = entry.waiters.shift();
          if (next) {
            // Ownership passes directly to the next waiter
            next();
          } else {
            entries.delete(key);
          }
        }
        return Promise.resolve();
      },
    };
  }

  return {
    acquire(key, options): Promise<Result<LockHandle>> {
      if (options.signal?.aborted) {
        return Promise.resolve(
          failure('LOCK_ABORTED', 'Aborted before acquiring the lock')
        );
      }

      const entry = entries.get(key);
      if (!entry) {
        entries.set(key, { waiters: [] });
        return Promise.resolve(success(handleFor(key)));
      }

      return new Promise<Result<LockHandle>>((resolve) => {
        const cleanup = (): void => {
          clearTimeout(timer);
          options.signal?.removeEventListener('abort', onAbort);
        };

        const grant = (): void => {
          cleanup();
          resolve(success(handleFor(key)));
        };

        const withdraw = (): void => {
          const index = entry.waiters.indexOf(grant);
          if (index !== -1) {
            entry.waiters.splice(index, 1);
          }
        };

        const onAbort = (): void => {
          cleanup();
          withdraw();
          resolve(
            failure('LOCK_ABORTED', 'Aborted while waiting for the lock')
          );
        };

        const timer = setTimeout(() => {
          cleanup();
          withdraw();
          resolve(
            failure(
              'LOCK_TIMEOUT',
              `Conversation is busy; lock not obtained within ${options.waitMs}ms`
            )
          );
        }, options.waitMs);

        options.signal?.addEventListener('abort', onAbort, { once: true });
        entry.waiters.push(grant);
      });
    },
  };
}

// ─────────────────────────────────────────────────────────────
// REDIS LEASE LOCK
// ─────────────────────────────────────────────────────────────

/**
 * Minimal Redis surface used by the lease lock
 */
export interface LeaseClient {
  /** SET key value NX PX ttl; true when the key was set */
  setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
  /** Delete key only when it still holds value */
  deleteIfEquals(key: string, value: string): Promise<void>;
}

export interface RedisLockConfig {
  /** Lease duration; must exceed the longest run */
  leaseMs: number;
  /** Delay between acquisition attempts */
  pollIntervalMs: number;
  /** Key prefix */
  prefix?: string;
}

/**
 * Create a distributed lock over Redis leases with owner tokens
 */
export function createRedisConversationLock(
  client: LeaseClient,
  config: RedisLockConfig
): ConversationLock {
  const prefix = config.prefix ?? 'conversation-lock:';

  return {
    async acquire(key, options): Promise<Result<LockHandle>> {
      const lockKey = `${prefix}${key}`;
      const token = randomUUID();
      const deadline = Date.now() + options.waitMs;

      for (;;) {
        if (options.signal?.aborted) {
          return failure('LOCK_ABORTED', 'Aborted while waiting for the lock');
        }

        let acquired: boolean;
        try {
          acquired = await client.setIfAbsent(lockKey, token, config.leaseMs);
        } catch (error) {
          console.error('[conversation-lock] Lease request failed:', error);
          return failure(
            'LOCK_UNAVAILABLE',
            'Conversation lock store is unavailable'
          );
        }

        if (acquired) {
          let released = false;
          return success({
            async release(): Promise<void> {
              if (released) {
                return;
              }
              released = true;
              await client.deleteIfEquals(lockKey, token);
            },
          });
        }

        const remaining = deadline - Date.now();
        if (remaining <= 0) {
          return failure(
            'LOCK_TIMEOUT',
            `Conversation is busy; lock not obtained within ${options.waitMs}ms`
          );
        }

        try {
          await delay(
            Math.min(config.pollIntervalMs, remaining),
            undefined,
            options.signal ? { signal: options.signal } : undefined
          );
        } catch {
          return failure('LOCK_ABORTED', 'Aborted while waiting for the lock');
        }
      }
    },
  };
}
