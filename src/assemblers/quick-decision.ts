/**
 * Quick Decision Assembler
 */

import type {
  QuickDecisionAnswer,
  QuickDecisionResponse,
  Result,
  ToolResult,
} from '@/types/index.js';
import { success } from '@/types/index.js';

import { indexToolOutputs, unique, unresolvedReferences } from './references.js';
import type { ResultAssembler } from './types.js';

export const quickDecisionAssembler: ResultAssembler<
  QuickDecisionAnswer,
  QuickDecisionResponse
> = {
  assemble(
    answer: QuickDecisionAnswer,
    toolResults: ToolResult[]
  ): Result<QuickDecisionResponse> {
    const { urls } = indexToolOutputs(toolResults);
    const sourceUrls = unique(answer.sourceUrls);

    const missing = sourceUrls.filter((url) => !urls.has(url));
    if (missing.length > 0) {
      return unresolvedReferences('source URLs', missing);
    }

    return success({
      kind: 'quick-decision',
      decision: answer.decision,
      reasoning: answer.reasoning,
      confidence: answer.confidence,
      sources: sourceUrls.map((url) => ({ title: urls.get(url) ?? url, url })),
    });
  },

  // A verdict cannot be synthesised from raw search results
  degrade(): null {
    return null;
  },
};
