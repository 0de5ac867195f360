/**
 * Research Assembler
 */

import type {
  ResearchAnswer,
  ResearchResponse,
  Result,
  ToolResult,
} from '@/types/index.js';
import { success } from '@/types/index.js';

import { indexToolOutputs, unique, unresolvedReferences } from './references.js';
import type { ResultAssembler } from './types.js';

const DEGRADED_CITATIONS = 5;

export const researchAssembler: ResultAssembler<
  ResearchAnswer,
  ResearchResponse
> = {
  assemble(
    answer: ResearchAnswer,
    toolResults: ToolResult[]
  ): Result<ResearchResponse> {
    const { urls } = indexToolOutputs(toolResults);

    const missing = unique(
      answer.citations
        .map((citation) => citation.url)
        .filter((url) => !urls.has(url))
    );
    if (missing.length > 0) {
      return unresolvedReferences('citation URLs', missing);
    }

    return success({
      kind: 'research-result',
      answer: answer.answer,
      citations: answer.citations.map((citation) => ({
        title: citation.title,
        url: citation.url,
      })),
    });
  },

  degrade(toolResults: ToolResult[]): ResearchAnswer | null {
    const items = [...indexToolOutputs(toolResults).searchItems.values()].slice(
      0,
      DEGRADED_CITATIONS
    );
    if (items.length === 0) {
      return null;
    }

    return {
      kind: 'research-result',
      degraded: true,
      answer:
        'The research could not be completed. These sources were found and may answer the question.',
      citations: items.map((item) => ({ title: item.title, url: item.link })),
    };
  },
};
