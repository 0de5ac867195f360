/**
 * Audit Types
 *
 * Audit logs are append-only. Orchestration turns are written here as
 * structured data, one row per turn.
 */

export interface AuditEvent {
  action: string;
  resourceType: string;
  resourceId?: string;
  details?: Record<string, unknown>;
}

export const AUDIT_ACTIONS = {
  ORCHESTRATION_TURN: 'orchestration.turn',
} as const;
