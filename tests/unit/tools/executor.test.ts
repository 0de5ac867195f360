/**
 * Tool Executor Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';

import { createToolExecutor } from '@/tools/executor.js';
import { defineToolAdapter } from '@/tools/define-tool.js';
import type { ToolAdapterRegistry, ToolExecutionContext } from '@/tools/types.js';
import { ToolError } from '@/tools/types.js';

const context = {
  requestId: 'req-1',
  conversationKey: 'user-1:conv-1',
};

function registryWith(
  handler: (
    args: { query: string },
    context: ToolExecutionContext
  ) => Promise<Record<string, unknown>>
): ToolAdapterRegistry {
  const adapter = defineToolAdapter({
    name: 'search',
    description: 'Test search',
    inputSchema: { type: 'object' },
    args: z.object({ query: z.string().min(1, 'query must not be empty') }),
    handler,
  });
  const registry: ToolAdapterRegistry = new Map();
  registry.set('search', adapter);
  return registry;
}

describe('Tool Executor', () => {
  it('returns the handler output as a success result', async () => {
    const executor = createToolExecutor({
      adapters: registryWith((args) => Promise.resolve({ echoed: args.query })),
      defaultTimeout: 1000,
    });

    const result = await executor.execute(
      { id: 'call-1', name: 'search', args: { query: 'desk lamp' } },
      context
    );

    expect(result).toMatchObject({
      callId: 'call-1',
      tool: 'search',
      status: 'success',
      output: { echoed: 'desk lamp' },
    });
    expect(result.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('rejects unknown tools without calling any adapter', async () => {
    const handler = vi.fn(() => Promise.resolve({}));
    const executor = createToolExecutor({
      adapters: registryWith(handler),
      defaultTimeout: 1000,
    });

    const result = await executor.execute(
      { id: 'call-1', name: 'calculator', args: {} },
      context
    );

    expect(result).toMatchObject({
      status: 'failure',
      reason: 'INVALID_TOOL_ARGUMENTS',
      message: 'Unknown tool: calculator',
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it('rejects known tools that are not in the registry', async () => {
    const executor = createToolExecutor({
      adapters: registryWith(() => Promise.resolve({})),
      defaultTimeout: 1000,
    });

    const result = await executor.execute(
      { id: 'call-1', name: 'locate', args: {} },
      context
    );

    expect(result).toMatchObject({
      status: 'failure',
      reason: 'INVALID_TOOL_ARGUMENTS',
      message: 'Unknown tool: locate',
    });
  });

  it('validates arguments before touching the dependency', async () => {
    const handler = vi.fn(() => Promise.resolve({}));
    const executor = createToolExecutor({
      adapters: registryWith(handler),
      defaultTimeout: 1000,
    });

    const result = await executor.execute(
      { id: 'call-1', name: 'search', args: { query: '' } },
      context
    );

    expect(result).toMatchObject({
      status: 'failure',
      reason: 'INVALID_TOOL_ARGUMENTS',
      message: 'query: query must not be empty',
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it('times out slow calls and aborts their signal', async () => {
    let seenSignal: AbortSignal | undefined;
    const executor = createToolExecutor({
      adapters: registryWith((_args, ctx) => {
        seenSignal = ctx.signal;
        return new Promise(() => undefined);
      }),
      defaultTimeout: 20,
    });

    const result = await executor.execute(
      { id: 'call-1', name: 'search', args: { query: 'slow' } },
      context
    );

    expect(result).toMatchObject({
      status: 'failure',
      reason: 'TOOL_TIMEOUT',
      message: "Tool 'search' timed out after 20ms",
    });
    expect(seenSignal?.aborted).toBe(true);
  });

  it('keeps the reason of a ToolError', async () => {
    const executor = createToolExecutor({
      adapters: registryWith(() =>
        Promise.reject(new ToolError('TOOL_TIMEOUT', 'upstream timed out'))
      ),
      defaultTimeout: 1000,
    });

    const result = await executor.execute(
      { id: 'call-1', name: 'search', args: { query: 'x' } },
      context
    );

    expect(result).toMatchObject({
      status: 'failure',
      reason: 'TOOL_TIMEOUT',
      message: 'upstream timed out',
    });
  });

  it('reports other errors as TOOL_FAILURE', async () => {
    const executor = createToolExecutor({
      adapters: registryWith(() => Promise.reject(new Error('socket hang up'))),
      defaultTimeout: 1000,
    });

    const result = await executor.execute(
      { id: 'call-1', name: 'search', args: { query: 'x' } },
      context
    );

    expect(result).toMatchObject({
      status: 'failure',
      reason: 'TOOL_FAILURE',
      message: 'socket hang up',
    });
  });

  it('stops waiting when the caller aborts', async () => {
    const controller = new AbortController();
    const executor = createToolExecutor({
      adapters: registryWith(() => new Promise(() => undefined)),
      defaultTimeout: 5000,
    });

    const pending = executor.execute(
      { id: 'call-1', name: 'search', args: { query: 'x' } },
      { ...context, signal: controller.signal }
    );
    controller.abort(new Error('client went away'));

    expect(await pending).toMatchObject({
      status: 'failure',
      reason: 'TOOL_FAILURE',
      message: 'client went away',
    });
  });

  it('exposes execution only', () => {
    const executor = createToolExecutor({
      adapters: registryWith(() => Promise.resolve({})),
      defaultTimeout: 1000,
    });

    expect(Object.keys(executor)).toEqual(['execute']);
  });
});
