/**
 * Result Assemblers
 * One per outcome kind
 */

import type {
  Mode,
  ResponsePayload,
  Result,
  TerminalAnswer,
  ToolResult,
} from '@/types/index.js';

import { productDiscoveryAssembler } from './product-discovery.js';
import { quickDecisionAssembler } from './quick-decision.js';
import { recommendationAssembler } from './recommendation.js';
import { researchAssembler } from './research.js';

/**
 * Assemble the response payload for a terminal answer
 */
export function assembleAnswer(
  answer: TerminalAnswer,
  toolResults: ToolResult[]
): Result<ResponsePayload> {
  switch (answer.kind) {
    case 'quick-decision':
      return quickDecisionAssembler.assemble(answer, toolResults);
    case 'recommendation-set':
      return recommendationAssembler.assemble(answer, toolResults);
    case 'product-discovery-result':
      return productDiscoveryAssembler.assemble(answer, toolResults);
    case 'research-result':
      return researchAssembler.assemble(answer, toolResults);
  }
}

/**
 * Degraded answer for a mode from accumulated tool results, if any
 */
export function degradeAnswer(
  mode: Mode,
  toolResults: ToolResult[]
): TerminalAnswer | null {
  switch (mode) {
    case 'quick-decision':
      return quickDecisionAssembler.degrade(toolResults);
    case 'recommendation':
      return recommendationAssembler.degrade(toolResults);
    case 'product-discovery':
      return productDiscoveryAssembler.degrade(toolResults);
    case 'research':
      return researchAssembler.degrade(toolResults);
  }
}

export { collectToolResults, indexToolOutputs } from './references.js';
export type { ToolOutputIndex } from './references.js';
export type { ResultAssembler } from './types.js';
export {
  quickDecisionAssembler,
  recommendationAssembler,
  productDiscoveryAssembler,
  researchAssembler,
};
