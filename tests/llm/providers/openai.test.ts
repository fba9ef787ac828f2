/**
 * OpenAI Conversion Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type OpenAI from 'openai';
import {
  fromOpenAICompletion,
  toOpenAIMessages,
  toOpenAITools,
} from '../../../src/llm/providers/openai.js';
import type { Message } from '../../../src/llm/types.js';
import { LLMError } from '../../../src/errors/types.js';

// Mock logger
vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

function createCompletion(choices: OpenAI.Chat.ChatCompletion.Choice[]): OpenAI.Chat.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1700000000,
    model: 'gpt-test',
    choices,
    usage: { prompt_tokens: 50, completion_tokens: 10, total_tokens: 60 },
  };
}

function createChoice(
  content: string | null,
  finishReason: OpenAI.Chat.ChatCompletion.Choice['finish_reason'],
  toolCalls?: OpenAI.Chat.ChatCompletionMessageToolCall[]
): OpenAI.Chat.ChatCompletion.Choice {
  return {
    index: 0,
    finish_reason: finishReason,
    logprobs: null,
    message: { role: 'assistant', content, refusal: null, tool_calls: toolCalls },
  };
}

describe('OpenAI conversions', () => {
  describe('toOpenAIMessages', () => {
    it('should put the system text first and split tool results into tool messages', () => {
      const messages: Message[] = [
        { role: 'user', content: [{ type: 'text', text: 'Outline please' }] },
        {
          role: 'assistant',
          content: [{ type: 'tool_use', id: 'call_1', name: 'get_course_outline', input: { course_name: 'Testing' } }],
        },
        {
          role: 'user',
          content: [{ type: 'tool_result', toolUseId: 'call_1', content: 'Course Title: Testing', isError: false }],
        },
      ];

      expect(toOpenAIMessages('Be brief.', messages)).toEqual([
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Outline please' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [
            {
              id: 'call_1',
              type: 'function',
              function: { name: 'get_course_outline', arguments: '{"course_name":"Testing"}' },
            },
          ],
        },
        { role: 'tool', tool_call_id: 'call_1', content: 'Course Title: Testing' },
      ]);
    });

    it('should join assistant text and omit empty tool calls', () => {
      const messages: Message[] = [
        { role: 'assistant', content: [{ type: 'text', text: 'Line one' }, { type: 'text', text: 'Line two' }] },
      ];

      expect(toOpenAIMessages('sys', messages)).toEqual([
        { role: 'system', content: 'sys' },
        { role: 'assistant', content: 'Line one\nLine two' },
      ]);
    });
  });

  describe('toOpenAITools', () => {
    it('should wrap definitions as functions', () => {
      const tools = toOpenAITools([
        {
          name: 'search_course_content',
          description: 'Search',
          inputSchema: {
            type: 'object',
            properties: { query: { type: 'string', description: 'Query' } },
            required: ['query'],
          },
        },
      ]);

      expect(tools).toEqual([
        {
          type: 'function',
          function: {
            name: 'search_course_content',
            description: 'Search',
            parameters: {
              type: 'object',
              properties: { query: { type: 'string', description: 'Query' } },
              required: ['query'],
            },
          },
        },
      ]);
    });
  });

  describe('fromOpenAICompletion', () => {
    it('should map tool calls to a tool request', () => {
      const response = fromOpenAICompletion(
        createCompletion([
          createChoice(null, 'tool_calls', [
            { id: 'call_1', type: 'function', function: { name: 'search_course_content', arguments: '{"query":"mocks"}' } },
          ]),
        ])
      );

      expect(response).toEqual({
        stopSignal: 'tool_requested',
        content: [{ type: 'tool_use', id: 'call_1', name: 'search_course_content', input: { query: 'mocks' } }],
        usage: { inputTokens: 50, outputTokens: 10 },
      });
    });

    it('should map a stop to a direct answer', () => {
      const response = fromOpenAICompletion(createCompletion([createChoice('Mocks replace collaborators.', 'stop')]));

      expect(response.stopSignal).toBe('direct_answer');
      expect(response.content).toEqual([{ type: 'text', text: 'Mocks replace collaborators.' }]);
    });

    it('should use empty input for malformed arguments', () => {
      const response = fromOpenAICompletion(
        createCompletion([
          createChoice(null, 'tool_calls', [
            { id: 'call_2', type: 'function', function: { name: 'get_course_outline', arguments: '{not json' } },
          ]),
        ])
      );

      expect(response.content).toEqual([{ type: 'tool_use', id: 'call_2', name: 'get_course_outline', input: {} }]);
    });

    it('should reject a completion without choices', () => {
      expect(() => fromOpenAICompletion(createCompletion([]))).toThrow(LLMError);
    });
  });
});
