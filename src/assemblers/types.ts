/**
 * Result Assembler Types
 */

import type { Result, TerminalAnswer, ToolResult } from '@/types/index.js';

/**
 * Turns a validated terminal answer into its response payload, and
 * synthesises a degraded answer when the loop is exhausted. Pure.
 */
export interface ResultAssembler<A extends TerminalAnswer, R> {
  /** Fails with UNRESOLVED_REFERENCE when the answer cites unknown outputs */
  assemble(answer: A, toolResults: ToolResult[]): Result<R>;
  /** null when no degraded form can be built */
  degrade(toolResults: ToolResult[]): A | null;
}
