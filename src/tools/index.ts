/**
 * Tool Layer Exports
 *
 * Adapters are stateless and never touch conversation state.
 */

// Types
export type {
  ToolExecutionContext,
  PreparedToolCall,
  ToolAdapter,
  ToolAdapterSpec,
  ToolAdapterRegistry,
  ToolExecutor,
} from './types.js';

export { ToolError } from './types.js';

// Tool Executor Factory
export { createToolExecutor } from './executor.js';
export type { CreateToolExecutorDeps } from './executor.js';

export { defineToolAdapter, formatZodIssues } from './define-tool.js';

// Adapters
export {
  MODE_TOOLS,
  createToolAdapters,
  selectAdapters,
  pickAdapters,
  getToolDefinitions,
  createSearchAdapter,
  createParseAdapter,
  createEnrichAdapter,
  createLocateAdapter,
  searchOutputSchema,
  parseOutputSchema,
  enrichOutputSchema,
  searchItemId,
  parsePrice,
  curateImages,
  curateShoppingLinks,
  LOOPBACK_FALLBACK_IP,
} from './adapters/index.js';
export type {
  ToolAdapterDeps,
  SearchItem,
  SearchOutput,
  ParseOutput,
  EnrichedProduct,
  EnrichOutput,
} from './adapters/index.js';

// External clients
export { createSerperClient } from './serper/client.js';
export type {
  SerperClient,
  SerperClientConfig,
  OrganicResult,
  ShoppingResult,
  ImageResult,
  ScrapeResult,
} from './serper/client.js';
export { createGeolocationClient } from './geolocation/client.js';
export type {
  GeolocationClient,
  GeolocationClientConfig,
  Location,
} from './geolocation/client.js';
