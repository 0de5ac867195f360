/**
 * Terminal Answer Types
 *
 * SCOPE: the four outcome kinds an orchestration run can converge on, and
 * the response payloads the result assemblers turn them into.
 */

/**
 * Orchestration modes, one transport endpoint each
 */
export const MODES = [
  'quick-decision',
  'recommendation',
  'product-discovery',
  'research',
] as const;

export type Mode = (typeof MODES)[number];

// ─────────────────────────────────────────────────────────────
// LLM TERMINAL PAYLOADS (what the model emits, per mode)
// ─────────────────────────────────────────────────────────────

export interface QuickDecisionPayload {
  decision: string;
  reasoning: string;
  confidence: 'low' | 'medium' | 'high';
  sourceUrls: string[];
}

export interface RecommendationPayload {
  summary: string;
  recommendations: Array<{
    productName: string;
    rationale: string;
    sourceUrls: string[];
  }>;
  strategicAlternatives: string[];
}

export interface ProductDiscoveryPayload {
  summary: string;
  items: Array<{
    id: string;
    title: string;
    price?: number;
    reason: string;
  }>;
}

export interface ResearchPayload {
  answer: string;
  citations: Array<{
    title: string;
    url: string;
  }>;
}

export interface TerminalPayloadByMode {
  'quick-decision': QuickDecisionPayload;
  recommendation: RecommendationPayload;
  'product-discovery': ProductDiscoveryPayload;
  research: ResearchPayload;
}

// ─────────────────────────────────────────────────────────────
// TERMINAL ANSWERS
// ─────────────────────────────────────────────────────────────

interface AnswerBase {
  /** True when synthesised from tool results after the loop was exhausted */
  degraded: boolean;
}

export interface QuickDecisionAnswer extends AnswerBase, QuickDecisionPayload {
  kind: 'quick-decision';
}

export interface RecommendationSetAnswer
  extends AnswerBase,
    RecommendationPayload {
  kind: 'recommendation-set';
}

export interface ProductDiscoveryAnswer
  extends AnswerBase,
    ProductDiscoveryPayload {
  kind: 'product-discovery-result';
}

export interface ResearchAnswer extends AnswerBase, ResearchPayload {
  kind: 'research-result';
}

export type TerminalAnswer =
  | QuickDecisionAnswer
  | RecommendationSetAnswer
  | ProductDiscoveryAnswer
  | ResearchAnswer;

// ─────────────────────────────────────────────────────────────
// ASSEMBLED RESPONSES
// ─────────────────────────────────────────────────────────────

export interface SourceLink {
  title: string;
  url: string;
}

export interface QuickDecisionResponse {
  kind: 'quick-decision';
  decision: string;
  reasoning: string;
  confidence: QuickDecisionPayload['confidence'];
  sources: SourceLink[];
}

export interface RecommendationResponse {
  kind: 'recommendation-set';
  summary: string;
  recommendations: Array<{
    productName: string;
    rationale: string;
    sources: SourceLink[];
  }>;
  productNames: string[];
  strategicAlternatives: string[];
}

export interface ShoppingLink {
  source: string;
  link: string;
  price: string;
  delivery: string;
}

export interface DiscoveredProduct {
  id: string;
  title: string;
  price: number | null;
  reason: string;
  link: string;
  source: string | null;
  images: string[];
  shoppingLinks: ShoppingLink[];
}

export interface ProductDiscoveryResponse {
  kind: 'product-discovery-result';
  summary: string;
  items: DiscoveredProduct[];
}

export interface ResearchResponse {
  kind: 'research-result';
  answer: string;
  citations: SourceLink[];
}

export type ResponsePayload =
  | QuickDecisionResponse
  | RecommendationResponse
  | ProductDiscoveryResponse
  | ResearchResponse;
