/**
 * Prompt Builder Unit Tests
 * System message assembly, history serialisation and truncation
 */

import { describe, it, expect } from 'vitest';

import {
  ANSWER_CONTRACTS,
  CORE_INSTRUCTIONS,
  createPromptBuilder,
  MODE_TEMPLATES,
} from '@/orchestrator/prompt-builder.js';
import { createToolAdapters } from '@/tools/index.js';
import type { ConversationState, Message } from '@/types/index.js';

import { createFakeSerper } from '../../helpers/test-utils.js';

const registry = createToolAdapters({
  serper: createFakeSerper(),
  geolocation: {
    lookup: () => Promise.reject(new Error('not used')),
  },
});

const builder = createPromptBuilder({ adapters: registry });

const meta = { runId: 'run-1', createdAt: '2026-01-01T00:00:00.000Z' };

function user(content: string, correction = false): Message {
  return correction
    ? { role: 'user', content, correction: true, ...meta }
    : { role: 'user', content, ...meta };
}

function reply(content: string): Message {
  return { role: 'assistant', content, toolCalls: [], ...meta };
}

function toolTurn(callId: string, query: string): Message[] {
  return [
    {
      role: 'assistant',
      content: '',
      toolCalls: [{ id: callId, name: 'search', args: { query } }],
      ...meta,
    },
    {
      role: 'tool-result',
      result: {
        callId,
        tool: 'search',
        status: 'failure',
        reason: 'TOOL_TIMEOUT',
        message: 'timed out',
        durationMs: 5,
      },
      ...meta,
    },
  ];
}

function state(messages: Message[]): ConversationState {
  return { id: 'user-1:conv-1', messages, toolResults: {} };
}

describe('Prompt Builder', () => {
  describe('system message', () => {
    it('combines core rules, the mode template and the answer contract', () => {
      const payload = builder.build(state([user('Is this lamp good?')]), 'research', {
        maxInputTokens: 60000,
      });

      expect(payload.messages[0]).toEqual({
        role: 'system',
        content: [
          CORE_INSTRUCTIONS,
          `\n${MODE_TEMPLATES.research}`,
          `\n## FINAL ANSWER FORMAT\n${ANSWER_CONTRACTS.research}`,
        ].join('\n'),
      });
    });

    it('includes the local time when given', () => {
      const payload = builder.build(state([]), 'quick-decision', {
        maxInputTokens: 60000,
        context: { localTime: '2026-10-19 09:00', clientIp: '203.0.113.7' },
      });

      expect(payload.messages[0]?.content).toContain(
        '\n\n## REQUEST CONTEXT\nUser local time: 2026-10-19 09:00'
      );
      expect(payload.messages[0]?.content).not.toContain('203.0.113.7');
    });

    it('includes the location hint after the local time', () => {
      const payload = builder.build(state([]), 'quick-decision', {
        maxInputTokens: 60000,
        context: { localTime: '2026-10-19 09:00', locationHint: 'Nairobi, Kenya' },
      });

      expect(payload.messages[0]?.content).toContain(
        '\n\n## REQUEST CONTEXT\nUser local time: 2026-10-19 09:00\nUser approximate location: Nairobi, Kenya'
      );
    });

    it('adds a context section for a location hint alone', () => {
      const payload = builder.build(state([]), 'recommendation', {
        maxInputTokens: 60000,
        context: { locationHint: 'Lyon, France' },
      });

      expect(
        payload.messages[0]?.content.endsWith(
          '\n\n## REQUEST CONTEXT\nUser approximate location: Lyon, France'
        )
      ).toBe(true);
    });
  });

  describe('tools', () => {
    it('lists only the tools of the mode', () => {
      const research = builder.build(state([]), 'research', { maxInputTokens: 60000 });
      const discovery = builder.build(state([]), 'product-discovery', {
        maxInputTokens: 60000,
      });

      expect(research.tools.map((tool) => tool.function.name)).toEqual(['search', 'parse']);
      expect(discovery.tools.map((tool) => tool.function.name)).toEqual([
        'search',
        'parse',
        'enrich',
      ]);
      expect(research.tools[0]?.type).toBe('function');
    });
  });

  describe('history', () => {
    it('serialises tool turns in order', () => {
      const payload = builder.build(
        state([user('Find a lamp'), ...toolTurn('call_1', 'lamp'), reply('{}')]),
        'research',
        { maxInputTokens: 60000 }
      );

      expect(payload.messages.slice(1)).toEqual([
        { role: 'user', content: 'Find a lamp' },
        {
          role: 'assistant',
          content: '',
          tool_calls: [
            {
              id: 'call_1',
              type: 'function',
              function: { name: 'search', arguments: '{"query":"lamp"}' },
            },
          ],
        },
        {
          role: 'tool',
          content:
            '{"status":"failure","reason":"TOOL_TIMEOUT","message":"timed out"}',
          tool_call_id: 'call_1',
        },
        { role: 'assistant', content: '{}' },
      ]);
      expect(payload.truncatedCount).toBe(0);
    });

    it('drops tool results with no matching call', () => {
      const [, orphan] = toolTurn('call_9', 'lamp');

      const payload = builder.build(state([user('Find a lamp'), orphan]), 'research', {
        maxInputTokens: 60000,
      });

      expect(payload.messages).toHaveLength(2);
      expect(payload.truncatedCount).toBe(1);
    });

    it('is deterministic', () => {
      const conversation = state([user('Find a lamp'), ...toolTurn('call_1', 'lamp')]);

      expect(builder.build(conversation, 'recommendation', { maxInputTokens: 60000 })).toEqual(
        builder.build(conversation, 'recommendation', { maxInputTokens: 60000 })
      );
    });
  });

  describe('truncation', () => {
    it('drops the oldest history but keeps the latest query and tool turn', () => {
      const payload = builder.build(
        state([
          user('Old question'),
          reply('Old answer'),
          user('New question'),
          ...toolTurn('call_2', 'new'),
        ]),
        'research',
        { maxInputTokens: 1 }
      );

      expect(payload.truncatedCount).toBe(2);
      expect(payload.messages.map((message) => message.content)).toEqual([
        expect.any(String),
        'New question',
        '',
        '{"status":"failure","reason":"TOOL_TIMEOUT","message":"timed out"}',
      ]);
    });

    it('keeps a trailing correction with the reply it corrects', () => {
      const payload = builder.build(
        state([
          user('Old question'),
          reply('Old answer'),
          user('New question'),
          reply('not json'),
          user('Reply again with JSON', true),
        ]),
        'research',
        { maxInputTokens: 1 }
      );

      expect(payload.truncatedCount).toBe(2);
      expect(payload.messages.slice(1)).toEqual([
        { role: 'user', content: 'New question' },
        { role: 'assistant', content: 'not json' },
        { role: 'user', content: 'Reply again with JSON' },
      ]);
    });

    it('estimates tokens at four characters each', () => {
      const payload = builder.build(state([user('Find a lamp')]), 'research', {
        maxInputTokens: 60000,
      });
      const characters =
        (payload.messages[0]?.content.length ?? 0) +
        JSON.stringify(payload.tools).length +
        'Find a lamp'.length;

      expect(payload.estimatedTokens).toBe(Math.ceil(characters / 4));
    });
  });
});
