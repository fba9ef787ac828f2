/**
 * Completion Service Factory
 */

import type { LLMConfig, CompletionService } from './types.js';
import { AnthropicCompletionService } from './providers/anthropic.js';
import { OpenAICompletionService } from './providers/openai.js';
import { ConfigError } from '../errors/types.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-20250514';
export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

/**
 * Create a completion service based on configuration
 */
export function createCompletionService(config: LLMConfig): CompletionService {
  switch (config.provider) {
    case 'anthropic':
      return new AnthropicCompletionService(config);
    case 'openai':
      return new OpenAICompletionService(config);
    default: {
      const provider: never = config.provider;
      throw new ConfigError(`Unknown LLM provider: ${String(provider)}`);
    }
  }
}

/**
 * Get default LLM configuration from environment variables
 */
export function getDefaultLLMConfig(): LLMConfig {
  // Priority: Anthropic > OpenAI
  if (process.env.ANTHROPIC_API_KEY) {
    return {
      provider: 'anthropic',
      model: process.env.ANTHROPIC_MODEL ?? DEFAULT_ANTHROPIC_MODEL,
      apiKey: process.env.ANTHROPIC_API_KEY,
      baseUrl: process.env.ANTHROPIC_BASE_URL,
    };
  }

  if (process.env.OPENAI_API_KEY) {
    return {
      provider: 'openai',
      model: process.env.OPENAI_MODEL ?? DEFAULT_OPENAI_MODEL,
      apiKey: process.env.OPENAI_API_KEY,
      baseUrl: process.env.OPENAI_BASE_URL,
    };
  }

  throw new ConfigError('No LLM API key found. Set ANTHROPIC_API_KEY or OPENAI_API_KEY.');
}
