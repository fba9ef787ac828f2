/**
 * Agent Types
 */

import type { CompletionResponse, ToolDefinition } from '../llm/types.js';
import type { Source } from '../tools/types.js';

/**
 * Runs a tool by name. ToolRegistry is the usual implementation.
 */
export interface ToolExecutor {
  execute(name: string, input: Record<string, unknown>): Promise<string>;
}

export interface GenerateOptions {
  /** Earlier exchanges, appended verbatim to the system text */
  conversationHistory?: string;
  tools?: ToolDefinition[];
  toolExecutor?: ToolExecutor;
}

/**
 * Why a query ended
 */
export type FinalizeReason = 'direct_answer' | 'tool_error' | 'budget_exhausted';

/**
 * Orchestrator states. Each state has exactly one way out.
 */
export type OrchestratorState =
  | { phase: 'init' }
  | { phase: 'model_call'; round: number; toolsEnabled: boolean }
  | { phase: 'direct_answer'; round: number; response: CompletionResponse }
  | { phase: 'tool_round'; round: number; response: CompletionResponse }
  | { phase: 'finalize'; round: number; reason: Exclude<FinalizeReason, 'direct_answer'> }
  | { phase: 'done'; text: string };

export type OrchestratorPhase = OrchestratorState['phase'];

/**
 * Orchestrator configuration
 */
export interface OrchestratorConfig {
  maxRounds: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  maxRounds: 2,
};

/**
 * Returned when the state machine fails to reach `done`
 */
export const MAX_ROUNDS_SENTINEL = 'Error: Maximum rounds exceeded without proper termination';

/**
 * Result text for tool calls not run because an earlier call in the round failed
 */
export const SKIPPED_TOOL_RESULT = 'Tool execution skipped: an earlier tool call in this round failed';

/**
 * Answer plus the citations gathered while producing it
 */
export interface AssistantAnswer {
  answer: string;
  sources: Source[];
  sessionId?: string;
}
