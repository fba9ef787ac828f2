/**
 * OpenAI GPT Client
 */

import OpenAI from 'openai';
import type {
  CompletionRequest,
  CompletionResponse,
  CompletionService,
  ContentBlock,
  LLMConfig,
  LLMProvider,
  Message,
  ToolDefinition,
} from '../types.js';
import { DEFAULT_COMPLETION_LIMITS } from '../types.js';
import { LLMError } from '../../errors/types.js';
import { parseJsonObject } from '../../utils/json.js';
import { getLogger } from '../../utils/logger.js';

type ChatMessageParam = OpenAI.Chat.ChatCompletionMessageParam;

/**
 * Convert conversation messages to chat completion params. Tool results
 * become one `tool` message each; text in the same user turn follows them.
 */
export function toOpenAIMessages(system: string, messages: Message[]): ChatMessageParam[] {
  const result: ChatMessageParam[] = [{ role: 'system', content: system }];

  for (const msg of messages) {
    const texts: string[] = [];

    if (msg.role === 'assistant') {
      const toolCalls: OpenAI.Chat.ChatCompletionMessageToolCall[] = [];
      for (const block of msg.content) {
        switch (block.type) {
          case 'text':
            texts.push(block.text);
            break;
          case 'tool_use':
            toolCalls.push({
              id: block.id,
              type: 'function',
              function: { name: block.name, arguments: JSON.stringify(block.input) },
            });
            break;
          case 'tool_result':
            // Never produced by the assistant
            break;
        }
      }
      const assistant: OpenAI.Chat.ChatCompletionAssistantMessageParam = {
        role: 'assistant',
        content: texts.length > 0 ? texts.join('\n') : null,
      };
      if (toolCalls.length > 0) {
        assistant.tool_calls = toolCalls;
      }
      result.push(assistant);
      continue;
    }

    for (const block of msg.content) {
      switch (block.type) {
        case 'text':
          texts.push(block.text);
          break;
        case 'tool_result':
          result.push({ role: 'tool', tool_call_id: block.toolUseId, content: block.content });
          break;
        case 'tool_use':
          break;
      }
    }
    if (texts.length > 0) {
      result.push({ role: 'user', content: texts.join('\n') });
    }
  }

  return result;
}

export function toOpenAITools(tools: ToolDefinition[]): OpenAI.Chat.ChatCompletionTool[] {
  return tools.map(tool => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: 'object',
        properties: tool.inputSchema.properties,
        required: tool.inputSchema.required,
      },
    },
  }));
}

/**
 * Convert a chat completion to a completion response
 */
export function fromOpenAICompletion(completion: OpenAI.Chat.ChatCompletion): CompletionResponse {
  const choice = completion.choices[0];
  if (!choice) {
    throw new LLMError('Empty response from model', 'unknown');
  }

  const content: ContentBlock[] = [];
  if (choice.message.content) {
    content.push({ type: 'text', text: choice.message.content });
  }

  for (const call of choice.message.tool_calls ?? []) {
    const input = parseJsonObject(call.function.arguments);
    if (!input) {
      getLogger().warn({ tool: call.function.name }, 'Tool call arguments are not a JSON object');
    }
    content.push({
      type: 'tool_use',
      id: call.id,
      name: call.function.name,
      input: input ?? {},
    });
  }

  return {
    stopSignal: choice.finish_reason === 'tool_calls' ? 'tool_requested' : 'direct_answer',
    content,
    usage: {
      inputTokens: completion.usage?.prompt_tokens ?? 0,
      outputTokens: completion.usage?.completion_tokens ?? 0,
    },
  };
}

export class OpenAICompletionService implements CompletionService {
  readonly provider: LLMProvider = 'openai';
  readonly model: string;

  private client: OpenAI;
  private maxTokens: number;
  private temperature: number;

  constructor(config: LLMConfig) {
    this.model = config.model;
    this.maxTokens = config.maxTokens ?? DEFAULT_COMPLETION_LIMITS.maxTokens;
    this.temperature = config.temperature ?? DEFAULT_COMPLETION_LIMITS.temperature;

    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeout ?? DEFAULT_COMPLETION_LIMITS.timeout,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      messages: toOpenAIMessages(request.system, request.messages),
    };

    if (request.tools && request.tools.length > 0) {
      params.tools = toOpenAITools(request.tools);
      params.tool_choice = request.toolChoice ?? 'auto';
    }

    let completion: OpenAI.Chat.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(params);
    } catch (error) {
      throw this.handleError(error);
    }

    getLogger().debug(
      { model: this.model, finishReason: completion.choices[0]?.finish_reason },
      'OpenAI completion received'
    );
    return fromOpenAICompletion(completion);
  }

  private handleError(error: unknown): LLMError {
    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof OpenAI.RateLimitError) {
      const retryAfter = error.headers?.['retry-after'];
      return new LLMError(message, 'rate_limit', retryAfter ? parseInt(retryAfter, 10) : undefined);
    }

    if (error instanceof OpenAI.AuthenticationError) {
      return new LLMError(message, 'auth_error');
    }

    if (error instanceof OpenAI.APIConnectionError) {
      return new LLMError(message, 'timeout');
    }

    if (error instanceof OpenAI.InternalServerError) {
      return new LLMError(message, 'service_unavailable');
    }

    if (error instanceof OpenAI.BadRequestError) {
      return message.includes('context')
        ? new LLMError(message, 'context_overflow')
        : new LLMError(message, 'invalid_request');
    }

    return new LLMError(message, 'unknown');
  }
}
