/**
 * Search Tool
 *
 * Web search through Serper. When a price bound is given the shopping
 * vertical is used instead of organic results, and items priced outside
 * the bounds are dropped.
 */

import { createHash } from 'node:crypto';

import { z } from 'zod';

import { defineToolAdapter } from '../define-tool.js';
import type { SerperClient } from '../serper/client.js';
import type { ToolAdapter } from '../types.js';

export const searchArgsSchema = z
  .object({
    query: z.string().trim().min(1, 'query must not be empty'),
    maxPrice: z.number().positive().optional(),
    minPrice: z.number().nonnegative().optional(),
    limit: z.number().int().min(1).max(20).default(10),
  })
  .refine(
    (args) =>
      args.minPrice === undefined ||
      args.maxPrice === undefined ||
      args.minPrice <= args.maxPrice,
    { message: 'minPrice must not exceed maxPrice', path: ['minPrice'] }
  );

export type SearchArgs = z.output<typeof searchArgsSchema>;

export const searchItemSchema = z.object({
  id: z.string(),
  title: z.string(),
  link: z.string(),
  snippet: z.string().optional(),
  price: z.number().optional(),
  source: z.string().optional(),
});

export const searchOutputSchema = z.object({
  query: z.string(),
  items: z.array(searchItemSchema),
});

export type SearchItem = z.infer<typeof searchItemSchema>;
export type SearchOutput = z.infer<typeof searchOutputSchema>;

export const searchToolDefinition = {
  type: 'object',
  properties: {
    query: {
      type: 'string',
      description: 'Search query, e.g. "best noise cancelling headphones 2025"',
    },
    maxPrice: {
      type: 'number',
      description: 'Upper price bound. Switches to shopping results.',
    },
    minPrice: {
      type: 'number',
      description: 'Lower price bound. Switches to shopping results.',
    },
    limit: {
      type: 'integer',
      minimum: 1,
      maximum: 20,
      description: 'Maximum number of results (default 10)',
    },
  },
  required: ['query'],
};

/**
 * Stable item id derived from the result link
 */
export function searchItemId(link: string): string {
  return createHash('sha256').update(link).digest('hex').slice(0, 16);
}

/**
 * Parse a display price such as "$1,299.99" or "1.299,00 €" into a number
 */
export function parsePrice(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const match = /\d[\d.,]*/.exec(raw);
  if (!match) {
    return undefined;
  }
  let digits = match[0];
  // Comma as decimal separator: "1.299,00"
  if (/,\d{2}$/.test(digits)) {
    digits = digits.replace(/\./g, '').replace(',', '.');
  } else {
    digits = digits.replace(/,/g, '');
  }
  const value = Number.parseFloat(digits);
  return Number.isFinite(value) ? value : undefined;
}

function withinBounds(price: number | undefined, args: SearchArgs): boolean {
  if (price === undefined) {
    return true;
  }
  if (args.minPrice !== undefined && price < args.minPrice) {
    return false;
  }
  if (args.maxPrice !== undefined && price > args.maxPrice) {
    return false;
  }
  return true;
}

export function createSearchAdapter(deps: { serper: SerperClient }): ToolAdapter {
  const { serper } = deps;

  return defineToolAdapter({
    name: 'search',
    description:
      'Search the web for products, reviews and buying guides. Provide a price bound to get shopping listings with prices.',
    inputSchema: searchToolDefinition,
    args: searchArgsSchema,
    async handler(args, context) {
      const priced =
        args.maxPrice !== undefined || args.minPrice !== undefined;

      let items: SearchItem[];
      if (priced) {
        const results = await serper.shopping(args.query, context.signal);
        items = results
          .map((result) => {
            const item: SearchItem = {
              id: searchItemId(result.link),
              title: result.title,
              link: result.link,
            };
            const price = parsePrice(result.price);
            if (price !== undefined) {
              item.price = price;
            }
            if (result.source !== undefined) {
              item.source = result.source;
            }
            return item;
          })
          .filter((item) => withinBounds(item.price, args));
      } else {
        const results = await serper.search(args.query, context.signal);
        items = results.map((result) => {
          const item: SearchItem = {
            id: searchItemId(result.link),
            title: result.title,
            link: result.link,
          };
          if (result.snippet !== undefined) {
            item.snippet = result.snippet;
          }
          return item;
        });
      }

      const output: SearchOutput = {
        query: args.query,
        items: items.slice(0, args.limit),
      };
      return output;
    },
  });
}
