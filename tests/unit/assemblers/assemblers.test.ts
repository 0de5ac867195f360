/**
 * Result Assembler Tests
 */

import { describe, it, expect } from 'vitest';

import {
  assembleAnswer,
  collectToolResults,
  degradeAnswer,
  indexToolOutputs,
  productDiscoveryAssembler,
  quickDecisionAssembler,
  recommendationAssembler,
  researchAssembler,
} from '@/assemblers/index.js';
import { searchItemId } from '@/tools/index.js';
import type { ToolResult } from '@/types/index.js';
import { appendToState, createConversationState } from '@/types/index.js';

import { parseResult, searchResult } from '../../helpers/test-utils.js';

const LAMP_A = {
  title: 'Lamp A',
  link: 'https://shop.example.com/lamp-a',
  snippet: 'Warm light',
  price: 25,
  source: 'Shop A',
};
const LAMP_B = { title: 'Lamp B', link: 'https://shop.example.com/lamp-b' };
const GUIDE_URL = 'https://reviews.example.com/lamps';

const SEARCH = searchResult('call-1', [LAMP_A, LAMP_B]);
const PAGE = parseResult('call-2', GUIDE_URL, 'Best Lamps');

const ENRICH: ToolResult = {
  callId: 'call-3',
  tool: 'enrich',
  status: 'success',
  output: {
    enrichedProducts: [
      {
        productName: 'Lamp A',
        images: ['https://img.example.com/a.jpg'],
        shoppingLinks: [
          {
            source: 'Shop A',
            link: 'https://shop.example.com/buy-a',
            price: '$25.00',
            delivery: 'Free delivery',
          },
        ],
      },
    ],
  },
  durationMs: 1,
};

const FAILED: ToolResult = {
  callId: 'call-4',
  tool: 'search',
  status: 'failure',
  reason: 'TOOL_TIMEOUT',
  message: 'timed out',
  durationMs: 5,
};

describe('indexToolOutputs', () => {
  it('should index search items, pages and enrichment', () => {
    const index = indexToolOutputs([SEARCH, PAGE, ENRICH, FAILED]);

    expect([...index.searchItems.keys()]).toEqual([
      searchItemId(LAMP_A.link),
      searchItemId(LAMP_B.link),
    ]);
    expect(index.pages).toEqual([{ url: GUIDE_URL, title: 'Best Lamps', text: 'Page text' }]);
    expect([...index.enrichment.keys()]).toEqual(['lamp a']);
    expect([...index.urls.entries()]).toEqual([
      [LAMP_A.link, 'Lamp A'],
      [LAMP_B.link, 'Lamp B'],
      [GUIDE_URL, 'Best Lamps'],
    ]);
  });

  it('should keep the first title for a repeated URL', () => {
    const index = indexToolOutputs([
      searchResult('call-1', [LAMP_A]),
      parseResult('call-2', LAMP_A.link, 'Lamp A product page'),
    ]);

    expect(index.urls.get(LAMP_A.link)).toBe('Lamp A');
  });

  it('should use the URL as title for an untitled page', () => {
    const index = indexToolOutputs([parseResult('call-2', GUIDE_URL)]);

    expect(index.urls.get(GUIDE_URL)).toBe(GUIDE_URL);
  });

  it('should skip outputs that do not match the tool schema', () => {
    const index = indexToolOutputs([
      { callId: 'call-1', tool: 'search', status: 'success', output: { items: 'none' }, durationMs: 1 },
      { callId: 'call-2', tool: 'locate', status: 'success', output: { city: 'Kigali' }, durationMs: 1 },
    ]);

    expect(index.searchItems.size).toBe(0);
    expect(index.urls.size).toBe(0);
  });
});

describe('collectToolResults', () => {
  it('should return tool results in message order', () => {
    const state = appendToState(createConversationState('user-1:conv-1'), [
      { role: 'user', content: 'Which lamp?', runId: 'run-1', createdAt: '2026-01-01T00:00:00.000Z' },
      { role: 'tool-result', result: PAGE, runId: 'run-1', createdAt: '2026-01-01T00:00:01.000Z' },
      { role: 'tool-result', result: SEARCH, runId: 'run-2', createdAt: '2026-01-01T00:00:02.000Z' },
    ]);

    expect(collectToolResults(state)).toEqual([PAGE, SEARCH]);
  });
});

describe('quickDecisionAssembler', () => {
  it('should attach titles to cited sources', () => {
    const result = quickDecisionAssembler.assemble(
      {
        kind: 'quick-decision',
        degraded: false,
        decision: 'Buy Lamp A',
        reasoning: 'Warm and cheap.',
        confidence: 'high',
        sourceUrls: [GUIDE_URL, LAMP_A.link, GUIDE_URL],
      },
      [SEARCH, PAGE]
    );

    expect(result).toEqual({
      success: true,
      data: {
        kind: 'quick-decision',
        decision: 'Buy Lamp A',
        reasoning: 'Warm and cheap.',
        confidence: 'high',
        sources: [
          { title: 'Best Lamps', url: GUIDE_URL },
          { title: 'Lamp A', url: LAMP_A.link },
        ],
      },
    });
  });

  it('should reject URLs no tool produced', () => {
    const result = quickDecisionAssembler.assemble(
      {
        kind: 'quick-decision',
        degraded: false,
        decision: 'Buy Lamp C',
        reasoning: 'Seen elsewhere.',
        confidence: 'low',
        sourceUrls: ['https://elsewhere.example.com', 'https://elsewhere.example.com'],
      },
      [SEARCH]
    );

    expect(result).toEqual({
      success: false,
      error: {
        code: 'UNRESOLVED_REFERENCE',
        message:
          'Answer cites source URLs that no tool produced: https://elsewhere.example.com',
        details: { missing: ['https://elsewhere.example.com'] },
      },
    });
  });

  it('should not degrade', () => {
    expect(quickDecisionAssembler.degrade([SEARCH])).toBeNull();
  });
});

describe('recommendationAssembler', () => {
  it('should build recommendations with product names', () => {
    const result = recommendationAssembler.assemble(
      {
        kind: 'recommendation-set',
        degraded: false,
        summary: 'Two good lamps.',
        recommendations: [
          { productName: 'Lamp A', rationale: 'Warm.', sourceUrls: [LAMP_A.link] },
          { productName: 'Lamp B', rationale: 'Bright.', sourceUrls: [] },
        ],
        strategicAlternatives: ['Candles'],
      },
      [SEARCH]
    );

    expect(result).toEqual({
      success: true,
      data: {
        kind: 'recommendation-set',
        summary: 'Two good lamps.',
        recommendations: [
          {
            productName: 'Lamp A',
            rationale: 'Warm.',
            sources: [{ title: 'Lamp A', url: LAMP_A.link }],
          },
          { productName: 'Lamp B', rationale: 'Bright.', sources: [] },
        ],
        productNames: ['Lamp A', 'Lamp B'],
        strategicAlternatives: ['Candles'],
      },
    });
  });

  it('should reject unknown source URLs across recommendations', () => {
    const result = recommendationAssembler.assemble(
      {
        kind: 'recommendation-set',
        degraded: false,
        summary: 'Lamps.',
        recommendations: [
          { productName: 'Lamp A', rationale: 'Warm.', sourceUrls: ['https://x.example.com'] },
          { productName: 'Lamp B', rationale: 'Bright.', sourceUrls: ['https://y.example.com'] },
        ],
        strategicAlternatives: [],
      },
      [SEARCH]
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.details).toEqual({
        missing: ['https://x.example.com', 'https://y.example.com'],
      });
    }
  });

  it('should degrade to the first search items', () => {
    const items = ['C', 'D', 'E', 'F'].map((letter) => ({
      title: `Lamp ${letter}`,
      link: `https://shop.example.com/lamp-${letter.toLowerCase()}`,
    }));

    const degraded = recommendationAssembler.degrade([
      SEARCH,
      searchResult('call-5', items),
    ]);

    expect(degraded).toEqual({
      kind: 'recommendation-set',
      degraded: true,
      summary:
        'Research was cut short. These products appeared in the search results gathered so far.',
      recommendations: [
        { productName: 'Lamp A', rationale: 'Warm light', sourceUrls: [LAMP_A.link] },
        {
          productName: 'Lamp B',
          rationale: 'Appeared in search results.',
          sourceUrls: [LAMP_B.link],
        },
        {
          productName: 'Lamp C',
          rationale: 'Appeared in search results.',
          sourceUrls: ['https://shop.example.com/lamp-c'],
        },
      ],
      strategicAlternatives: ['Lamp D', 'Lamp E', 'Lamp F'],
    });
  });

  it('should not degrade without search items', () => {
    expect(recommendationAssembler.degrade([PAGE, FAILED])).toBeNull();
  });
});

describe('productDiscoveryAssembler', () => {
  const idA = searchItemId(LAMP_A.link);
  const idB = searchItemId(LAMP_B.link);

  it('should join items with search results and enrichment', () => {
    const result = productDiscoveryAssembler.assemble(
      {
        kind: 'product-discovery-result',
        degraded: false,
        summary: 'Two lamps.',
        items: [
          { id: idA, title: 'Lamp A', reason: 'Warm.' },
          { id: idB, title: 'Lamp B', price: 40, reason: 'Bright.' },
        ],
      },
      [SEARCH, ENRICH]
    );

    expect(result).toEqual({
      success: true,
      data: {
        kind: 'product-discovery-result',
        summary: 'Two lamps.',
        items: [
          {
            id: idA,
            title: 'Lamp A',
            price: 25,
            reason: 'Warm.',
            link: LAMP_A.link,
            source: 'Shop A',
            images: ['https://img.example.com/a.jpg'],
            shoppingLinks: [
              {
                source: 'Shop A',
                link: 'https://shop.example.com/buy-a',
                price: '$25.00',
                delivery: 'Free delivery',
              },
            ],
          },
          {
            id: idB,
            title: 'Lamp B',
            price: 40,
            reason: 'Bright.',
            link: LAMP_B.link,
            source: null,
            images: [],
            shoppingLinks: [],
          },
        ],
      },
    });
  });

  it('should match enrichment by the search title when the item is renamed', () => {
    const result = productDiscoveryAssembler.assemble(
      {
        kind: 'product-discovery-result',
        degraded: false,
        summary: 'One lamp.',
        items: [{ id: idA, title: 'The warm one', reason: 'Warm.' }],
      },
      [SEARCH, ENRICH]
    );

    expect(result.success && result.data.items[0]?.images).toEqual([
      'https://img.example.com/a.jpg',
    ]);
  });

  it('should reject unknown item ids', () => {
    const result = productDiscoveryAssembler.assemble(
      {
        kind: 'product-discovery-result',
        degraded: false,
        summary: 'Lamps.',
        items: [
          { id: idA, title: 'Lamp A', reason: 'Warm.' },
          { id: 'deadbeef', title: 'Ghost', reason: 'Imagined.' },
        ],
      },
      [SEARCH]
    );

    expect(result).toEqual({
      success: false,
      error: {
        code: 'UNRESOLVED_REFERENCE',
        message: 'Answer cites item ids that no tool produced: deadbeef',
        details: { missing: ['deadbeef'] },
      },
    });
  });

  it('should degrade to at most five search items', () => {
    const items = ['C', 'D', 'E', 'F'].map((letter) => ({
      title: `Lamp ${letter}`,
      link: `https://shop.example.com/lamp-${letter.toLowerCase()}`,
    }));

    const degraded = productDiscoveryAssembler.degrade([SEARCH, searchResult('call-5', items)]);

    expect(degraded?.summary).toBe(
      'Showing the first 5 products found before the search was cut short.'
    );
    expect(degraded?.items.map((item) => item.title)).toEqual([
      'Lamp A',
      'Lamp B',
      'Lamp C',
      'Lamp D',
      'Lamp E',
    ]);
    expect(degraded?.items[0]).toEqual({ id: idA, title: 'Lamp A', price: 25, reason: 'Warm light' });
    expect(degraded?.items[1]).toEqual({ id: idB, title: 'Lamp B', reason: 'Matched your search.' });
  });
});

describe('researchAssembler', () => {
  it('should keep the citations', () => {
    const result = researchAssembler.assemble(
      {
        kind: 'research-result',
        degraded: false,
        answer: 'LED lamps last longer.',
        citations: [{ title: 'Guide', url: GUIDE_URL }],
      },
      [PAGE]
    );

    expect(result).toEqual({
      success: true,
      data: {
        kind: 'research-result',
        answer: 'LED lamps last longer.',
        citations: [{ title: 'Guide', url: GUIDE_URL }],
      },
    });
  });

  it('should reject citations no tool produced', () => {
    const result = researchAssembler.assemble(
      {
        kind: 'research-result',
        degraded: false,
        answer: 'LED lamps last longer.',
        citations: [{ title: 'Blog', url: 'https://blog.example.com' }],
      },
      [PAGE, FAILED]
    );

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe(
        'Answer cites citation URLs that no tool produced: https://blog.example.com'
      );
    }
  });

  it('should degrade to search links as citations', () => {
    expect(researchAssembler.degrade([SEARCH])).toEqual({
      kind: 'research-result',
      degraded: true,
      answer:
        'The research could not be completed. These sources were found and may answer the question.',
      citations: [
        { title: 'Lamp A', url: LAMP_A.link },
        { title: 'Lamp B', url: LAMP_B.link },
      ],
    });
  });
});

describe('assembleAnswer / degradeAnswer', () => {
  it('should dispatch on the answer kind', () => {
    const result = assembleAnswer(
      {
        kind: 'research-result',
        degraded: false,
        answer: 'Yes.',
        citations: [],
      },
      []
    );

    expect(result).toEqual({
      success: true,
      data: { kind: 'research-result', answer: 'Yes.', citations: [] },
    });
  });

  it('should dispatch on the mode', () => {
    expect(degradeAnswer('quick-decision', [SEARCH])).toBeNull();
    expect(degradeAnswer('research', [])).toBeNull();
    expect(degradeAnswer('recommendation', [SEARCH])?.kind).toBe('recommendation-set');
    expect(degradeAnswer('product-discovery', [SEARCH])?.kind).toBe('product-discovery-result');
  });
});
