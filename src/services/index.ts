/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to the database. Each has an in-memory
 * backing for tests and local runs, and a Supabase one.
 */

// Conversation store
export type {
  ConversationStore,
  ConversationService,
} from './conversation.service.js';
export {
  createInMemoryConversationStore,
  createConversationService,
} from './conversation.service.js';
export { createConversationStoreDb } from './conversation.db.js';

// Share encoder
export type { ShareService, ShareServiceDb } from './share.service.js';
export { createShareService, createInMemoryShareDb } from './share.service.js';
export { createShareServiceDb } from './share.db.js';

// Audit and turn events
export type {
  AuditService,
  AuditServiceDb,
  AuditLogEntry,
} from './audit.service.js';
export {
  createAuditService,
  createAuditTurnEventSink,
  createInMemoryTurnEventSink,
} from './audit.service.js';
export { createAuditServiceDb } from './audit.db.js';
