/**
 * Completion Service Types
 */

export type LLMProvider = 'anthropic' | 'openai';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  timeout?: number;
}

/**
 * Deterministic, short answers
 */
export const DEFAULT_COMPLETION_LIMITS = {
  temperature: 0,
  maxTokens: 800,
  timeout: 60000,
};

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

/**
 * Blocks a model can produce
 */
export type ContentBlock = TextBlock | ToolUseBlock;

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  content: string;
  isError: boolean;
}

/**
 * Blocks that can appear in a conversation message
 */
export type MessageBlock = ContentBlock | ToolResultBlock;

export interface Message {
  role: 'user' | 'assistant';
  content: MessageBlock[];
}

/**
 * JSON schema of a tool's input, as sent to the model
 */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, {
    type: string;
    description: string;
    enum?: string[];
  }>;
  required: string[];
};

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export type ToolChoice = 'auto';

export interface CompletionRequest {
  messages: Message[];
  system: string;
  tools?: ToolDefinition[];
  toolChoice?: ToolChoice;
}

/**
 * Whether the model wants a tool run or has answered
 */
export type StopSignal = 'tool_requested' | 'direct_answer';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CompletionResponse {
  stopSignal: StopSignal;
  content: ContentBlock[];
  usage?: TokenUsage;
}

/**
 * Completion service interface
 */
export interface CompletionService {
  readonly provider: LLMProvider;
  readonly model: string;

  /**
   * Run one completion. Transport failures reject with LLMError.
   */
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * First text block of a completion, or '' when the model produced none
 */
export function firstText(content: ContentBlock[]): string {
  for (const block of content) {
    switch (block.type) {
      case 'text':
        return block.text;
      case 'tool_use':
        continue;
    }
  }
  return '';
}

export function toolUseBlocks(content: ContentBlock[]): ToolUseBlock[] {
  return content.filter((block): block is ToolUseBlock => block.type === 'tool_use');
}
