/**
 * Product Discovery Assembler
 *
 * Items must reference search results by id. The response carries the
 * search item's link and source, plus images and offers when the product
 * was enriched.
 */

import type {
  DiscoveredProduct,
  ProductDiscoveryAnswer,
  ProductDiscoveryResponse,
  Result,
  ToolResult,
} from '@/types/index.js';
import { success } from '@/types/index.js';

import { indexToolOutputs, unique, unresolvedReferences } from './references.js';
import type { ResultAssembler } from './types.js';

const DEGRADED_ITEMS = 5;

export const productDiscoveryAssembler: ResultAssembler<
  ProductDiscoveryAnswer,
  ProductDiscoveryResponse
> = {
  assemble(
    answer: ProductDiscoveryAnswer,
    toolResults: ToolResult[]
  ): Result<ProductDiscoveryResponse> {
    const { searchItems, enrichment } = indexToolOutputs(toolResults);

    const missing = unique(
      answer.items.map((item) => item.id).filter((id) => !searchItems.has(id))
    );
    if (missing.length > 0) {
      return unresolvedReferences('item ids', missing);
    }

    const items = answer.items.flatMap((item): DiscoveredProduct[] => {
      const found = searchItems.get(item.id);
      if (!found) {
        return [];
      }
      const enriched =
        enrichment.get(item.title.toLowerCase()) ??
        enrichment.get(found.title.toLowerCase());
      return [
        {
          id: item.id,
          title: item.title,
          price: item.price ?? found.price ?? null,
          reason: item.reason,
          link: found.link,
          source: found.source ?? null,
          images: enriched?.images ?? [],
          shoppingLinks: enriched?.shoppingLinks ?? [],
        },
      ];
    });

    return success({
      kind: 'product-discovery-result',
      summary: answer.summary,
      items,
    });
  },

  degrade(toolResults: ToolResult[]): ProductDiscoveryAnswer | null {
    const items = [...indexToolOutputs(toolResults).searchItems.values()].slice(
      0,
      DEGRADED_ITEMS
    );
    if (items.length === 0) {
      return null;
    }

    return {
      kind: 'product-discovery-result',
      degraded: true,
      summary: `Showing the first ${items.length} products found before the search was cut short.`,
      items: items.map((item) => ({
        id: item.id,
        title: item.title,
        ...(item.price !== undefined && { price: item.price }),
        reason: item.snippet ?? 'Matched your search.',
      })),
    };
  },
};
