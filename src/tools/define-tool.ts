/**
 * Tool adapter factory
 *
 * Binds a zod argument schema to a handler so that the executor can validate
 * before any external call is made.
 */

import type { z } from 'zod';

import { success, failure } from '@/types/index.js';

import type { ToolAdapter, ToolAdapterSpec } from './types.js';

/**
 * Render zod issues as a single line the LLM can act on
 */
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : 'args';
      return `${path}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Create a tool adapter from its schema and handler
 */
export function defineToolAdapter<S extends z.ZodTypeAny>(
  spec: ToolAdapterSpec<S>
): ToolAdapter {
  return {
    name: spec.name,
    definition: {
      name: spec.name,
      description: spec.description,
      inputSchema: spec.inputSchema,
    },
    prepare(args) {
      const parsed = spec.args.safeParse(args);
      if (!parsed.success) {
        return failure('INVALID_TOOL_ARGUMENTS', formatZodIssues(parsed.error));
      }
      const validArgs: z.output<S> = parsed.data;
      return success((context) => spec.handler(validArgs, context));
    },
  };
}
