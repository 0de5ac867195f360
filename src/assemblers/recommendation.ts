/**
 * Recommendation Assembler
 */

import type {
  RecommendationResponse,
  RecommendationSetAnswer,
  Result,
  ToolResult,
} from '@/types/index.js';
import { success } from '@/types/index.js';

import { indexToolOutputs, unique, unresolvedReferences } from './references.js';
import type { ResultAssembler } from './types.js';

const DEGRADED_PICKS = 3;
const DEGRADED_ALTERNATIVES = 5;

export const recommendationAssembler: ResultAssembler<
  RecommendationSetAnswer,
  RecommendationResponse
> = {
  assemble(
    answer: RecommendationSetAnswer,
    toolResults: ToolResult[]
  ): Result<RecommendationResponse> {
    const { urls } = indexToolOutputs(toolResults);

    const missing = unique(
      answer.recommendations.flatMap((rec) =>
        rec.sourceUrls.filter((url) => !urls.has(url))
      )
    );
    if (missing.length > 0) {
      return unresolvedReferences('source URLs', missing);
    }

    return success({
      kind: 'recommendation-set',
      summary: answer.summary,
      recommendations: answer.recommendations.map((rec) => ({
        productName: rec.productName,
        rationale: rec.rationale,
        sources: unique(rec.sourceUrls).map((url) => ({
          title: urls.get(url) ?? url,
          url,
        })),
      })),
      productNames: answer.recommendations.map((rec) => rec.productName),
      strategicAlternatives: answer.strategicAlternatives,
    });
  },

  degrade(toolResults: ToolResult[]): RecommendationSetAnswer | null {
    const items = [...indexToolOutputs(toolResults).searchItems.values()];
    if (items.length === 0) {
      return null;
    }

    const picks = items.slice(0, DEGRADED_PICKS);
    return {
      kind: 'recommendation-set',
      degraded: true,
      summary:
        'Research was cut short. These products appeared in the search results gathered so far.',
      recommendations: picks.map((item) => ({
        productName: item.title,
        rationale: item.snippet ?? 'Appeared in search results.',
        sourceUrls: [item.link],
      })),
      strategicAlternatives: items
        .slice(DEGRADED_PICKS, DEGRADED_PICKS + DEGRADED_ALTERNATIVES)
        .map((item) => item.title),
    };
  },
};
