/**
 * Terminal Answer Parsing Tests
 */

import { describe, it, expect } from 'vitest';

import {
  parseTerminalAnswer,
  stripCodeFence,
  terminalAnswerSchema,
} from '@/orchestrator/terminal.js';

describe('stripCodeFence', () => {
  it('removes a fenced block with a language tag', () => {
    expect(stripCodeFence('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('removes a fence on a single line', () => {
    expect(stripCodeFence('```{"a":1}```')).toBe('{"a":1}');
  });

  it('leaves unfenced text trimmed', () => {
    expect(stripCodeFence('  {"a":1}\n')).toBe('{"a":1}');
  });
});

describe('parseTerminalAnswer', () => {
  it('parses a fenced quick decision and defaults sourceUrls', () => {
    const result = parseTerminalAnswer(
      'quick-decision',
      '```json\n{"decision":"Buy it","reasoning":"Well reviewed.","confidence":"high"}\n```'
    );

    expect(result).toEqual({
      success: true,
      data: {
        kind: 'quick-decision',
        degraded: false,
        decision: 'Buy it',
        reasoning: 'Well reviewed.',
        confidence: 'high',
        sourceUrls: [],
      },
    });
  });

  it('tags each mode with its answer kind', () => {
    const discovery = parseTerminalAnswer(
      'product-discovery',
      JSON.stringify({
        summary: 'Two lamps',
        items: [{ id: 'abc', title: 'Lamp A', price: 25, reason: 'Cheap' }],
      })
    );
    const research = parseTerminalAnswer(
      'research',
      JSON.stringify({ answer: 'LED lasts longer.' })
    );

    expect(discovery.success && discovery.data.kind).toBe('product-discovery-result');
    expect(research).toEqual({
      success: true,
      data: {
        kind: 'research-result',
        degraded: false,
        answer: 'LED lasts longer.',
        citations: [],
      },
    });
  });

  it('fails on an empty reply', () => {
    const result = parseTerminalAnswer('research', '   ');

    expect(result).toEqual({
      success: false,
      error: { code: 'MALFORMED_TERMINAL_ANSWER', message: 'Reply was empty' },
    });
  });

  it('fails on prose', () => {
    const result = parseTerminalAnswer('research', 'Here is my answer');

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.code).toBe('MALFORMED_TERMINAL_ANSWER');
      expect(result.error.message).toMatch(/^Reply is not valid JSON: /);
    }
  });

  it('fails on a JSON array', () => {
    const result = parseTerminalAnswer('research', '[]');

    expect(!result.success && result.error.message).toBe('Reply must be a JSON object');
  });

  it('reports schema violations with their path', () => {
    const confidence = parseTerminalAnswer(
      'quick-decision',
      '{"decision":"Buy","reasoning":"Fine","confidence":"certain"}'
    );
    const empty = parseTerminalAnswer(
      'recommendation',
      '{"summary":"None","recommendations":[]}'
    );
    const citation = parseTerminalAnswer(
      'research',
      '{"answer":"Yes","citations":[{"title":"Guide","url":"not-a-url"}]}'
    );

    expect(!confidence.success && confidence.error.message).toBe(
      "confidence: Invalid enum value. Expected 'low' | 'medium' | 'high', received 'certain'"
    );
    expect(!empty.success && empty.error.message).toBe(
      'recommendations: Array must contain at least 1 element(s)'
    );
    expect(!citation.success && citation.error.message).toBe(
      'citations.0.url: Invalid url'
    );
  });
});

describe('terminalAnswerSchema', () => {
  it('accepts a stored answer', () => {
    const stored = {
      kind: 'research-result',
      degraded: true,
      answer: 'Partial',
      citations: [{ title: 'Guide', url: 'https://reviews.test/guide' }],
    };

    expect(terminalAnswerSchema.safeParse(stored)).toEqual({
      success: true,
      data: stored,
    });
  });

  it('rejects an unknown kind', () => {
    expect(
      terminalAnswerSchema.safeParse({ kind: 'essay', degraded: false, answer: 'x' })
        .success
    ).toBe(false);
  });
});
