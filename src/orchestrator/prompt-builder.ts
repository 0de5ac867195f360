/**
 * Prompt Builder Implementation
 *
 * Assembles the LLM request for one turn from conversation state:
 * system message (core rules + mode template + answer contract + request
 * context), serialised history and the mode's tool schemas. Deterministic
 * in its inputs.
 */

import type {
  ConversationState,
  LLMMessage,
  LLMToolDefinition,
  Message,
  Mode,
  PromptBuildOptions,
  PromptPayload,
  RequestContext,
  ToolDefinition,
  ToolResult,
} from '@/types/index.js';
import type { ToolAdapterRegistry } from '@/tools/index.js';
import { getToolDefinitions } from '@/tools/index.js';

/**
 * Core Instructions (IMMUTABLE)
 * Shared by every mode and never overridden by a mode template.
 */
export const CORE_INSTRUCTIONS = `## CORE RULES

You are a product research assistant. You help people decide what to buy.

### HONESTY
1. Never invent products, prices, specifications or URLs
2. Only cite URLs and item ids that appear in tool results of this conversation
3. Say so when the evidence is thin or conflicting

### TOOLS
1. Call tools when you need fresh facts; several independent calls may be issued at once
2. A failed tool call is reported back to you; adjust the arguments or proceed without it
3. When you have enough evidence, stop calling tools and reply with the final JSON answer

### OUTPUT
Your final reply must be a single JSON object, with no prose before or after it.`;

/**
 * Mode templates
 */
export const MODE_TEMPLATES: Record<Mode, string> = {
  'quick-decision': `## MODE: QUICK DECISION

The user wants a fast, decisive verdict on a single buying question
("should I buy X", "is X worth it", "X or Y").
- Keep research short: one or two searches, a page read only if it settles the question
- Use the locate tool only when availability or pricing depends on where the user is
- Commit to a clear decision and state your confidence honestly`,

  recommendation: `## MODE: RECOMMENDATION

The user wants a shortlist of products that fit their needs.
- Search for recent expert reviews and buying guides, then read the most relevant ones
- Recommend between one and five products, each with a rationale grounded in the sources
- Add strategic alternatives: options that trade one requirement for a clear gain elsewhere
- Use the enrich tool on your final picks when images or offers would help`,

  'product-discovery': `## MODE: PRODUCT DISCOVERY

The user wants to browse concrete products that are for sale.
- Use search with price bounds when the user states a budget, to get shopping listings
- Only pick items returned by search, and refer to them by their exact "id"
- Prefer variety: different brands, price points and styles`,

  research: `## MODE: RESEARCH

The user wants an explanation or a comparison rather than a purchase decision.
- Search broadly, then read the pages that matter
- Answer in plain language and cite the pages you relied on`,
};

/**
 * Final answer contract, one per mode
 */
export const ANSWER_CONTRACTS: Record<Mode, string> = {
  'quick-decision': `{
  "decision": "one-sentence verdict",
  "reasoning": "why, in two to four sentences",
  "confidence": "low" | "medium" | "high",
  "sourceUrls": ["url from a search result or read page"]
}`,

  recommendation: `{
  "summary": "overview of the shortlist",
  "recommendations": [
    {
      "productName": "exact product name",
      "rationale": "why it fits the user",
      "sourceUrls": ["url from a search result or read page"]
    }
  ],
  "strategicAlternatives": ["product name worth considering as a trade-off"]
}`,

  'product-discovery': `{
  "summary": "what was found",
  "items": [
    {
      "id": "the id of a search result item",
      "title": "product title",
      "price": 123.45,
      "reason": "why it is a good pick"
    }
  ]
}`,

  research: `{
  "answer": "the answer, in plain language",
  "citations": [{ "title": "page title", "url": "url from a search result or read page" }]
}`,
};

/**
 * Prompt Builder interface
 */
export interface PromptBuilder {
  build(
    state: ConversationState,
    mode: Mode,
    options: PromptBuildOptions
  ): PromptPayload;
}

/**
 * Approximate characters per token for English text
 */
const CHARS_PER_TOKEN = 4;

function formatContext(context: RequestContext | undefined): string {
  const lines: string[] = [];
  if (context?.localTime) {
    lines.push(`User local time: ${context.localTime}`);
  }
  if (context?.locationHint) {
    lines.push(`User approximate location: ${context.locationHint}`);
  }
  if (lines.length === 0) {
    return '';
  }
  return `\n## REQUEST CONTEXT\n${lines.join('\n')}`;
}

function buildSystemContent(mode: Mode, context?: RequestContext): string {
  return [
    CORE_INSTRUCTIONS,
    `\n${MODE_TEMPLATES[mode]}`,
    `\n## FINAL ANSWER FORMAT\n${ANSWER_CONTRACTS[mode]}`,
    formatContext(context),
  ]
    .filter((part) => part.length > 0)
    .join('\n');
}

/**
 * Convert tool definitions to LLM format
 */
function toolsToLLMFormat(tools: ToolDefinition[]): LLMToolDefinition[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  }));
}

function serialiseToolResult(result: ToolResult): string {
  return result.status === 'success'
    ? JSON.stringify({ status: 'success', output: result.output })
    : JSON.stringify({
        status: 'failure',
        reason: result.reason,
        message: result.message,
      });
}

function toLLMMessage(message: Message): LLMMessage {
  switch (message.role) {
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return {
        role: 'assistant',
        content: message.content,
        ...(message.toolCalls.length > 0 && {
          tool_calls: message.toolCalls.map((call) => ({
            id: call.id,
            type: 'function' as const,
            function: {
              name: call.name,
              arguments: JSON.stringify(call.args),
            },
          })),
        }),
      };
    case 'tool-result':
      return {
        role: 'tool',
        content: serialiseToolResult(message.result),
        tool_call_id: message.result.callId,
      };
  }
}

function messageLength(message: LLMMessage): number {
  let length = message.content.length;
  for (const call of message.tool_calls ?? []) {
    length += call.function.name.length + call.function.arguments.length;
  }
  return length;
}

/**
 * A history unit is dropped or kept as a whole: a single message, or an
 * assistant tool-call message together with its tool results.
 */
interface HistoryUnit {
  messages: LLMMessage[];
  length: number;
  isToolTurn: boolean;
  isUserQuery: boolean;
  isCorrection: boolean;
}

function groupHistory(messages: Message[]): {
  units: HistoryUnit[];
  orphans: number;
} {
  const units: HistoryUnit[] = [];
  let orphans = 0;
  let openCalls = new Set<string>();
  let current: HistoryUnit | undefined;

  for (const message of messages) {
    if (message.role === 'tool-result') {
      if (current?.isToolTurn && openCalls.has(message.result.callId)) {
        const llmMessage = toLLMMessage(message);
        current.messages.push(llmMessage);
        current.length += messageLength(llmMessage);
        openCalls.delete(message.result.callId);
      } else {
        orphans++;
      }
      continue;
    }

    const llmMessage = toLLMMessage(message);
    const isToolTurn =
      message.role === 'assistant' && message.toolCalls.length > 0;
    current = {
      messages: [llmMessage],
      length: messageLength(llmMessage),
      isToolTurn,
      isUserQuery: message.role === 'user' && message.correction !== true,
      isCorrection: message.role === 'user' && message.correction === true,
    };
    openCalls = new Set(
      message.role === 'assistant'
        ? message.toolCalls.map((call) => call.id)
        : []
    );
    units.push(current);
  }

  return { units, orphans };
}

function lastIndexWhere<T>(items: T[], predicate: (item: T) => boolean): number {
  for (let i = items.length - 1; i >= 0; i--) {
    const item = items[i];
    if (item !== undefined && predicate(item)) {
      return i;
    }
  }
  return -1;
}

/**
 * Units that must survive truncation: the latest user query, the latest
 * tool turn, and a trailing correction with the reply it corrects.
 */
function protectedUnits(units: HistoryUnit[]): Set<number> {
  const keep = new Set<number>();
  const lastQuery = lastIndexWhere(units, (unit) => unit.isUserQuery);
  if (lastQuery !== -1) {
    keep.add(lastQuery);
  }
  const lastToolTurn = lastIndexWhere(units, (unit) => unit.isToolTurn);
  if (lastToolTurn !== -1) {
    keep.add(lastToolTurn);
  }
  const last = units.length - 1;
  if (units[last]?.isCorrection) {
    keep.add(last);
    if (last > 0) {
      keep.add(last - 1);
    }
  }
  return keep;
}

/**
 * Create a prompt builder instance
 */
export function createPromptBuilder(deps: {
  adapters: ToolAdapterRegistry;
}): PromptBuilder {
  const { adapters } = deps;

  return {
    build(state, mode, options): PromptPayload {
      const systemContent = buildSystemContent(mode, options.context);
      const tools = toolsToLLMFormat(getToolDefinitions(adapters, mode));

      const fixedLength = systemContent.length + JSON.stringify(tools).length;
      const budget = options.maxInputTokens * CHARS_PER_TOKEN;

      const { units, orphans } = groupHistory(state.messages);
      const keep = protectedUnits(units);
      const dropped = new Set<number>();

      let total =
        fixedLength + units.reduce((sum, unit) => sum + unit.length, 0);
      // Oldest first
      for (let i = 0; i < units.length && total > budget; i++) {
        const unit = units[i];
        if (unit === undefined || keep.has(i)) {
          continue;
        }
        dropped.add(i);
        total -= unit.length;
      }

      const messages: LLMMessage[] = [
        { role: 'system', content: systemContent },
      ];
      let truncatedCount = orphans;
      units.forEach((unit, index) => {
        if (dropped.has(index)) {
          truncatedCount += unit.messages.length;
        } else {
          messages.push(...unit.messages);
        }
      });

      return {
        messages,
        tools,
        estimatedTokens: Math.ceil(total / CHARS_PER_TOKEN),
        truncatedCount,
      };
    },
  };
}
