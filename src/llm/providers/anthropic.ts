/**
 * Anthropic Claude Client
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  CompletionRequest,
  CompletionResponse,
  CompletionService,
  ContentBlock,
  LLMConfig,
  LLMProvider,
  Message,
  MessageBlock,
  ToolDefinition,
} from '../types.js';
import { DEFAULT_COMPLETION_LIMITS } from '../types.js';
import { LLMError } from '../../errors/types.js';
import { isRecord } from '../../utils/json.js';
import { getLogger } from '../../utils/logger.js';

/**
 * Convert conversation messages to Messages API params
 */
export function toAnthropicMessages(messages: Message[]): Anthropic.MessageParam[] {
  return messages.map(msg => ({
    role: msg.role,
    content: msg.content.map(toAnthropicBlock),
  }));
}

function toAnthropicBlock(block: MessageBlock): Anthropic.ContentBlockParam {
  switch (block.type) {
    case 'text':
      return { type: 'text', text: block.text };
    case 'tool_use':
      return { type: 'tool_use', id: block.id, name: block.name, input: block.input };
    case 'tool_result':
      return {
        type: 'tool_result',
        tool_use_id: block.toolUseId,
        content: block.content,
        is_error: block.isError,
      };
  }
}

export function toAnthropicTools(tools: ToolDefinition[]): Anthropic.Tool[] {
  return tools.map(tool => ({
    name: tool.name,
    description: tool.description,
    input_schema: {
      type: 'object',
      properties: tool.inputSchema.properties,
      required: tool.inputSchema.required,
    },
  }));
}

/**
 * Convert a Messages API response to a completion response. Block kinds the
 * orchestrator does not consume (thinking) are dropped.
 */
export function fromAnthropicMessage(message: Anthropic.Message): CompletionResponse {
  const content: ContentBlock[] = [];

  for (const block of message.content) {
    if (block.type === 'text') {
      content.push({ type: 'text', text: block.text });
    } else if (block.type === 'tool_use') {
      content.push({
        type: 'tool_use',
        id: block.id,
        name: block.name,
        input: isRecord(block.input) ? block.input : {},
      });
    }
  }

  return {
    stopSignal: message.stop_reason === 'tool_use' ? 'tool_requested' : 'direct_answer',
    content,
    usage: {
      inputTokens: message.usage.input_tokens,
      outputTokens: message.usage.output_tokens,
    },
  };
}

export class AnthropicCompletionService implements CompletionService {
  readonly provider: LLMProvider = 'anthropic';
  readonly model: string;

  private client: Anthropic;
  private maxTokens: number;
  private temperature: number;

  constructor(config: LLMConfig) {
    this.model = config.model;
    this.maxTokens = config.maxTokens ?? DEFAULT_COMPLETION_LIMITS.maxTokens;
    this.temperature = config.temperature ?? DEFAULT_COMPLETION_LIMITS.temperature;

    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeout ?? DEFAULT_COMPLETION_LIMITS.timeout,
    });
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const params: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      system: request.system,
      messages: toAnthropicMessages(request.messages),
    };

    if (request.tools && request.tools.length > 0) {
      params.tools = toAnthropicTools(request.tools);
      params.tool_choice = { type: request.toolChoice ?? 'auto' };
    }

    try {
      const response = await this.client.messages.create(params);
      getLogger().debug(
        { model: this.model, stopReason: response.stop_reason, blocks: response.content.length },
        'Anthropic completion received'
      );
      return fromAnthropicMessage(response);
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private handleError(error: unknown): LLMError {
    const message = error instanceof Error ? error.message : String(error);

    if (error instanceof Anthropic.RateLimitError) {
      const retryAfter = error.headers?.['retry-after'];
      return new LLMError(message, 'rate_limit', retryAfter ? parseInt(retryAfter, 10) : undefined);
    }

    if (error instanceof Anthropic.AuthenticationError) {
      return new LLMError(message, 'auth_error');
    }

    if (error instanceof Anthropic.APIConnectionError) {
      return new LLMError(message, 'timeout');
    }

    if (error instanceof Anthropic.InternalServerError) {
      return new LLMError(message, 'service_unavailable');
    }

    if (error instanceof Anthropic.BadRequestError) {
      return message.includes('token')
        ? new LLMError(message, 'context_overflow')
        : new LLMError(message, 'invalid_request');
    }

    return new LLMError(message, 'unknown');
  }
}
