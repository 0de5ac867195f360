/**
 * Tool Output Index
 *
 * Everything the conversation's successful tool calls produced, in call
 * order. Assemblers resolve the references of a terminal answer against
 * it.
 */

import type { ConversationState, Failure, ToolResult } from '@/types/index.js';
import { failure } from '@/types/index.js';
import {
  enrichOutputSchema,
  parseOutputSchema,
  searchOutputSchema,
} from '@/tools/index.js';
import type {
  EnrichedProduct,
  ParseOutput,
  SearchItem,
} from '@/tools/index.js';

export interface ToolOutputIndex {
  /** Search items by id, first occurrence wins */
  searchItems: Map<string, SearchItem>;
  pages: ParseOutput[];
  /** Enrichment by lower-cased product name, latest wins */
  enrichment: Map<string, EnrichedProduct>;
  /** Every URL a tool produced, with a display title */
  urls: Map<string, string>;
}

/**
 * Tool results of a conversation in message order
 */
export function collectToolResults(state: ConversationState): ToolResult[] {
  return state.messages.flatMap((message) =>
    message.role === 'tool-result' ? [message.result] : []
  );
}

export function indexToolOutputs(results: ToolResult[]): ToolOutputIndex {
  const index: ToolOutputIndex = {
    searchItems: new Map(),
    pages: [],
    enrichment: new Map(),
    urls: new Map(),
  };

  for (const result of results) {
    if (result.status !== 'success') {
      continue;
    }

    switch (result.tool) {
      case 'search': {
        const parsed = searchOutputSchema.safeParse(result.output);
        if (!parsed.success) {
          break;
        }
        for (const item of parsed.data.items) {
          if (!index.searchItems.has(item.id)) {
            index.searchItems.set(item.id, item);
          }
          if (!index.urls.has(item.link)) {
            index.urls.set(item.link, item.title);
          }
        }
        break;
      }
      case 'parse': {
        const parsed = parseOutputSchema.safeParse(result.output);
        if (!parsed.success) {
          break;
        }
        index.pages.push(parsed.data);
        if (!index.urls.has(parsed.data.url)) {
          index.urls.set(parsed.data.url, parsed.data.title ?? parsed.data.url);
        }
        break;
      }
      case 'enrich': {
        const parsed = enrichOutputSchema.safeParse(result.output);
        if (!parsed.success) {
          break;
        }
        for (const product of parsed.data.enrichedProducts) {
          index.enrichment.set(product.productName.toLowerCase(), product);
        }
        break;
      }
      default:
        break;
    }
  }

  return index;
}

/**
 * Failure listing references that no tool produced
 */
export function unresolvedReferences(what: string, missing: string[]): Failure {
  return failure(
    'UNRESOLVED_REFERENCE',
    `Answer cites ${what} that no tool produced: ${missing.join(', ')}`,
    { missing }
  );
}

/**
 * Unique values, first occurrence order
 */
export function unique(values: string[]): string[] {
  return [...new Set(values)];
}
