/**
 * Parse Tool
 * Fetches a page through the Serper scrape endpoint and returns its text
 */

import { z } from 'zod';

import { defineToolAdapter } from '../define-tool.js';
import type { SerperClient } from '../serper/client.js';
import type { ToolAdapter } from '../types.js';
import { ToolError } from '../types.js';

export const DEFAULT_PARSE_MAX_CHARS = 8000;

export const parseArgsSchema = z.object({
  url: z.string().url(),
  maxChars: z
    .number()
    .int()
    .min(200)
    .max(50000)
    .default(DEFAULT_PARSE_MAX_CHARS),
});

export const parseOutputSchema = z.object({
  url: z.string(),
  title: z.string().optional(),
  text: z.string(),
});

export type ParseOutput = z.infer<typeof parseOutputSchema>;

export function createParseAdapter(deps: { serper: SerperClient }): ToolAdapter {
  const { serper } = deps;

  return defineToolAdapter({
    name: 'parse',
    description:
      'Read the text content of a web page, such as a review or buying guide found by search.',
    inputSchema: {
      type: 'object',
      properties: {
        url: { type: 'string', description: 'Absolute URL of the page' },
        maxChars: {
          type: 'integer',
          minimum: 200,
          maximum: 50000,
          description: `Maximum characters of text to return (default ${DEFAULT_PARSE_MAX_CHARS})`,
        },
      },
      required: ['url'],
    },
    args: parseArgsSchema,
    async handler(args, context) {
      const page = await serper.scrape(args.url, context.signal);
      const text = page.text.trim();

      if (!text) {
        throw new ToolError('TOOL_FAILURE', `No content extracted from ${args.url}`);
      }

      const output: ParseOutput = {
        url: args.url,
        text: text.slice(0, args.maxChars),
      };
      const title = page.metadata?.title;
      if (title !== undefined) {
        output.title = title;
      }
      return output;
    },
  });
}
