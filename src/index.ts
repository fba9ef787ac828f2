/**
 * Lectern - course material Q&A with bounded tool rounds
 */

// Export types
export type {
  LLMConfig,
  LLMProvider,
  CompletionService,
  CompletionRequest,
  CompletionResponse,
  ContentBlock,
  TextBlock,
  ToolUseBlock,
  ToolResultBlock,
  Message,
  MessageBlock,
  StopSignal,
  TokenUsage,
  ToolDefinition,
} from './llm/types.js';
export type { Tool, ToolParameter, ToolRegistryConfig, Source } from './tools/types.js';
export type {
  RetrievalBackend,
  RetrievalOutcome,
  ChunkMetadata,
  SearchQuery,
  CourseOutline,
  LessonOutline,
} from './retrieval/types.js';
export type {
  GenerateOptions,
  ToolExecutor,
  FinalizeReason,
  OrchestratorState,
  OrchestratorPhase,
  OrchestratorConfig,
  AssistantAnswer,
} from './agent/types.js';
export type { AgentEvent, EventHandler } from './events/types.js';
export type { Exchange } from './agent/session-store.js';
export type { AskOptions } from './agent/assistant.js';
export type { LecternConfig } from './utils/config.js';
export type { Catalog } from './retrieval/catalog-store.js';

// Export errors
export { LecternError, LLMError, ToolError, RetrievalError, ConfigError } from './errors/types.js';

// Export completion services
export { createCompletionService, getDefaultLLMConfig } from './llm/client.js';
export { AnthropicCompletionService } from './llm/providers/anthropic.js';
export { OpenAICompletionService } from './llm/providers/openai.js';
export { firstText } from './llm/types.js';

// Export retrieval
export { CatalogStore } from './retrieval/catalog-store.js';
export { emptyOutcome, errorOutcome } from './retrieval/types.js';

// Export tools
export { ToolRegistry } from './tools/registry.js';
export { toToolDefinition, COURSE_TOOLS } from './tools/types.js';
export { createCourseTools, CourseSearchTool, CourseOutlineTool } from './tools/builtin/index.js';

// Export agents
export { Orchestrator } from './agent/orchestrator.js';
export { CourseAssistant } from './agent/assistant.js';
export { SessionStore } from './agent/session-store.js';
export { buildSystemPrompt } from './agent/prompt-builder.js';
export { DEFAULT_ORCHESTRATOR_CONFIG, MAX_ROUNDS_SENTINEL } from './agent/types.js';

// Export events
export { EventEmitter } from './events/emitter.js';

// Export utils
export { loadConfig, getDefaultConfig } from './utils/config.js';
export { initLogger, getLogger } from './utils/logger.js';
