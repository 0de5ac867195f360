/**
 * Terminal Answer Parsing
 *
 * The LLM ends a run by replying without tool calls. Its content must be a
 * JSON object (markdown fences tolerated) matching the active mode's
 * schema.
 */

import { z } from 'zod';

import type {
  Mode,
  Result,
  TerminalAnswer,
  TerminalPayloadByMode,
} from '@/types/index.js';
import { success, failure } from '@/types/index.js';
import { formatZodIssues } from '@/tools/index.js';

type PayloadSchema<M extends Mode> = z.ZodType<
  TerminalPayloadByMode[M],
  z.ZodTypeDef,
  unknown
>;

const nonEmpty = z.string().trim().min(1);

const quickDecisionSchema: PayloadSchema<'quick-decision'> = z.object({
  decision: nonEmpty,
  reasoning: nonEmpty,
  confidence: z.enum(['low', 'medium', 'high']),
  sourceUrls: z.array(z.string()).default([]),
});

const recommendationSchema: PayloadSchema<'recommendation'> = z.object({
  summary: nonEmpty,
  recommendations: z
    .array(
      z.object({
        productName: nonEmpty,
        rationale: nonEmpty,
        sourceUrls: z.array(z.string()).default([]),
      })
    )
    .min(1),
  strategicAlternatives: z.array(z.string()).default([]),
});

const productDiscoverySchema: PayloadSchema<'product-discovery'> = z.object({
  summary: nonEmpty,
  items: z
    .array(
      z.object({
        id: nonEmpty,
        title: nonEmpty,
        price: z.number().nonnegative().optional(),
        reason: nonEmpty,
      })
    )
    .min(1),
});

const researchSchema: PayloadSchema<'research'> = z.object({
  answer: nonEmpty,
  citations: z
    .array(
      z.object({
        title: nonEmpty,
        url: z.string().url(),
      })
    )
    .default([]),
});

export const TERMINAL_SCHEMAS: { [M in Mode]: PayloadSchema<M> } = {
  'quick-decision': quickDecisionSchema,
  recommendation: recommendationSchema,
  'product-discovery': productDiscoverySchema,
  research: researchSchema,
};

/**
 * Full terminal answer, as persisted in conversation history and shares
 */
export const terminalAnswerSchema: z.ZodType<
  TerminalAnswer,
  z.ZodTypeDef,
  unknown
> = z.union([
  z
    .object({ kind: z.literal('quick-decision'), degraded: z.boolean() })
    .and(quickDecisionSchema),
  z
    .object({ kind: z.literal('recommendation-set'), degraded: z.boolean() })
    .and(recommendationSchema),
  z
    .object({
      kind: z.literal('product-discovery-result'),
      degraded: z.boolean(),
    })
    .and(productDiscoverySchema),
  z
    .object({ kind: z.literal('research-result'), degraded: z.boolean() })
    .and(researchSchema),
]);

/**
 * Strip a surrounding markdown code fence, if any
 */
export function stripCodeFence(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith('```')) {
    return text;
  }
  const firstNewline = text.indexOf('\n');
  const lastFence = text.lastIndexOf('```');
  if (firstNewline !== -1 && lastFence > firstNewline) {
    return text.slice(firstNewline + 1, lastFence).trim();
  }
  return text.replace(/^```\w*\n?/, '').replace(/\n?```$/, '').trim();
}

function parseJsonObject(raw: string): Result<unknown> {
  const text = stripCodeFence(raw);
  if (!text) {
    return failure('MALFORMED_TERMINAL_ANSWER', 'Reply was empty');
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'invalid JSON';
    return failure(
      'MALFORMED_TERMINAL_ANSWER',
      `Reply is not valid JSON: ${message}`
    );
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return failure('MALFORMED_TERMINAL_ANSWER', 'Reply must be a JSON object');
  }
  return success(parsed);
}

function validate<M extends Mode>(
  mode: M,
  json: unknown
): Result<TerminalPayloadByMode[M]> {
  const schema: PayloadSchema<M> = TERMINAL_SCHEMAS[mode];
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return failure('MALFORMED_TERMINAL_ANSWER', formatZodIssues(parsed.error));
  }
  return success(parsed.data);
}

/**
 * Parse and validate a terminal reply for a mode
 */
export function parseTerminalAnswer(
  mode: Mode,
  content: string
): Result<TerminalAnswer> {
  const json = parseJsonObject(content);
  if (!json.success) {
    return json;
  }

  switch (mode) {
    case 'quick-decision': {
      const payload = validate(mode, json.data);
      return payload.success
        ? success<TerminalAnswer>({
            kind: 'quick-decision',
            degraded: false,
            ...payload.data,
          })
        : payload;
    }
    case 'recommendation': {
      const payload = validate(mode, json.data);
      return payload.success
        ? success<TerminalAnswer>({
            kind: 'recommendation-set',
            degraded: false,
            ...payload.data,
          })
        : payload;
    }
    case 'product-discovery': {
      const payload = validate(mode, json.data);
      return payload.success
        ? success<TerminalAnswer>({
            kind: 'product-discovery-result',
            degraded: false,
            ...payload.data,
          })
        : payload;
    }
    case 'research': {
      const payload = validate(mode, json.data);
      return payload.success
        ? success<TerminalAnswer>({
            kind: 'research-result',
            degraded: false,
            ...payload.data,
          })
        : payload;
    }
  }
}
