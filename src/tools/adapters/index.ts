/**
 * Tool Adapter Registry
 *
 * The closed set of adapters and the subset each mode exposes to the LLM.
 */

import type { Mode, ToolDefinition, ToolName } from '@/types/index.js';

import type { GeolocationClient } from '../geolocation/client.js';
import type { SerperClient } from '../serper/client.js';
import type { ToolAdapterRegistry } from '../types.js';

import { createEnrichAdapter } from './enrich.js';
import { createLocateAdapter } from './locate.js';
import { createParseAdapter } from './parse.js';
import { createSearchAdapter } from './search.js';

/**
 * Tools enabled per mode
 */
export const MODE_TOOLS: Record<Mode, readonly ToolName[]> = {
  'quick-decision': ['search', 'parse', 'locate'],
  recommendation: ['search', 'parse', 'enrich'],
  'product-discovery': ['search', 'parse', 'enrich'],
  research: ['search', 'parse'],
};

export interface ToolAdapterDeps {
  serper: SerperClient;
  geolocation: GeolocationClient;
}

/**
 * Create the full adapter registry
 */
export function createToolAdapters(deps: ToolAdapterDeps): ToolAdapterRegistry {
  const registry: ToolAdapterRegistry = new Map();
  for (const adapter of [
    createSearchAdapter(deps),
    createParseAdapter(deps),
    createEnrichAdapter(deps),
    createLocateAdapter(deps),
  ]) {
    registry.set(adapter.name, adapter);
  }
  return registry;
}

/**
 * Restrict a registry to the named tools
 */
export function pickAdapters(
  registry: ToolAdapterRegistry,
  names: readonly ToolName[]
): ToolAdapterRegistry {
  const selected: ToolAdapterRegistry = new Map();
  for (const name of names) {
    const adapter = registry.get(name);
    if (adapter) {
      selected.set(name, adapter);
    }
  }
  return selected;
}

/**
 * Restrict a registry to the tools a mode exposes
 */
export function selectAdapters(
  registry: ToolAdapterRegistry,
  mode: Mode
): ToolAdapterRegistry {
  return pickAdapters(registry, MODE_TOOLS[mode]);
}

/**
 * Tool definitions shown to the LLM for a mode
 */
export function getToolDefinitions(
  registry: ToolAdapterRegistry,
  mode: Mode
): ToolDefinition[] {
  return [...selectAdapters(registry, mode).values()].map(
    (adapter) => adapter.definition
  );
}

export {
  createSearchAdapter,
  searchOutputSchema,
  searchItemId,
  parsePrice,
} from './search.js';
export type { SearchItem, SearchOutput } from './search.js';
export { createParseAdapter, parseOutputSchema } from './parse.js';
export type { ParseOutput } from './parse.js';
export {
  createEnrichAdapter,
  enrichOutputSchema,
  curateImages,
  curateShoppingLinks,
} from './enrich.js';
export type { EnrichedProduct, EnrichOutput } from './enrich.js';
export { createLocateAdapter, LOOPBACK_FALLBACK_IP } from './locate.js';
