/**
 * Identity Types
 *
 * The orchestration core receives an already-authenticated actor (or an
 * anonymous one when auth is disabled). Identity is used only to scope the
 * conversation namespace.
 */

/**
 * Actor Context - who is performing the request
 */
export interface ActorContext {
  type: 'user' | 'anonymous';
  userId?: string;
  requestId: string;
  permissions: string[];
  ip?: string;
  userAgent?: string;
}

/**
 * Namespace used for conversations of unauthenticated callers
 */
export const ANONYMOUS_NAMESPACE = 'anonymous';

/**
 * Namespace holding the actor's conversations
 */
export function conversationNamespace(actor: ActorContext): string {
  return actor.type === 'anonymous' || actor.userId === undefined
    ? ANONYMOUS_NAMESPACE
    : actor.userId;
}

/**
 * Build the storage key of a conversation for the given actor.
 * Two actors using the same conversation id never share state.
 */
export function scopeConversationKey(
  actor: ActorContext,
  conversationId: string
): string {
  return `${conversationNamespace(actor)}:${conversationId}`;
}

/**
 * Split a storage key back into namespace and conversation id.
 * Conversation ids never contain ':'.
 */
export function splitConversationKey(key: string): {
  namespace: string;
  conversationId: string;
} {
  const separator = key.lastIndexOf(':');
  return {
    namespace: key.slice(0, Math.max(separator, 0)),
    conversationId: key.slice(separator + 1),
  };
}
