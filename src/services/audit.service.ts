/**
 * AuditService Implementation
 *
 * Purpose: Immutable audit logging
 * Owns: audit_logs
 * Dependencies: None (lowest level service)
 *
 * Orchestration turn events are recorded through the TurnEventSink
 * adapter at the bottom of this file.
 */

import type {
  ActorContext,
  AuditEvent,
  Result,
  TurnEvent,
  TurnEventSink,
} from '@/types/index.js';
import { success, failure, AUDIT_ACTIONS } from '@/types/index.js';

/**
 * Audit log insert parameters
 */
export interface AuditLogEntry {
  actorId: string | null;
  actorType: string;
  action: string;
  resourceType: string;
  resourceId: string | null;
  details: Record<string, unknown>;
  ipAddress: string | null;
  userAgent: string | null;
  requestId: string | null;
}

/**
 * Database abstraction interface for AuditService
 * Allows mocking in tests
 */
export interface AuditServiceDb {
  insertLog: (entry: AuditLogEntry) => Promise<{ id: string }>;
}

/**
 * AuditService interface
 */
export interface AuditService {
  log(actor: ActorContext, event: AuditEvent): Promise<Result<void>>;
}

/**
 * Build log entry from actor and event
 */
function buildLogEntry(actor: ActorContext, event: AuditEvent): AuditLogEntry {
  return {
    actorId: actor.userId ?? null,
    actorType: actor.type,
    action: event.action,
    resourceType: event.resourceType,
    resourceId: event.resourceId ?? null,
    details: event.details ?? {},
    ipAddress: actor.ip ?? null,
    userAgent: actor.userAgent ?? null,
    requestId: actor.requestId,
  };
}

/**
 * Create AuditService instance
 */
export function createAuditService(deps: { db: AuditServiceDb }): AuditService {
  const { db } = deps;

  return {
    /**
     * Log an audit event
     * This is the ONLY way to write to audit_logs
     */
    async log(actor: ActorContext, event: AuditEvent): Promise<Result<void>> {
      try {
        await db.insertLog(buildLogEntry(actor, event));
        return success(undefined);
      } catch (error) {
        console.error('[audit] Failed to write audit log:', error);
        return failure('INTERNAL_ERROR', 'Failed to write audit log');
      }
    },
  };
}

/**
 * Record orchestration turns as audit rows
 */
export function createAuditTurnEventSink(deps: {
  auditService: AuditService;
}): TurnEventSink {
  const { auditService } = deps;

  return {
    async record(event: TurnEvent): Promise<void> {
      const actor: ActorContext = {
        type: event.actorId === null ? 'anonymous' : 'user',
        requestId: event.requestId,
        permissions: [],
        ...(event.actorId !== null && { userId: event.actorId }),
      };

      const result = await auditService.log(actor, {
        action: AUDIT_ACTIONS.ORCHESTRATION_TURN,
        resourceType: 'conversation',
        resourceId: event.conversationKey,
        details: { ...event },
      });

      if (!result.success) {
        throw new Error(result.error.message);
      }
    },
  };
}

/**
 * Keep turn events in memory (tests and local development)
 */
export function createInMemoryTurnEventSink(
  maxEvents = 1000
): TurnEventSink & {
  events: TurnEvent[];
} {
  const events: TurnEvent[] = [];
  return {
    events,
    record(event) {
      events.push(structuredClone(event));
      if (events.length > maxEvents) {
        events.splice(0, events.length - maxEvents);
      }
      return Promise.resolve();
    },
  };
}
