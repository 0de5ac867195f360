/**
 * Share Types
 *
 * A share record is an immutable, externally resolvable pointer to a past
 * terminal answer. Write-once: there is no update or delete.
 */

import type { TerminalAnswer } from './answer.js';

export interface ShareRecord {
  id: string;
  answer: TerminalAnswer;
  /** Scoped key of the conversation the answer came from */
  conversationKey: string | null;
  createdAt: Date;
}

export interface EncodeShareParams {
  answer: TerminalAnswer;
  conversationKey?: string;
}
