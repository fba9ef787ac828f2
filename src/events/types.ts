/**
 * Event Types
 */

import type { FinalizeReason } from '../agent/types.js';
import type { TokenUsage } from '../llm/types.js';

/**
 * All event types emitted while answering a query
 */
export type AgentEvent =
  | GenerateStartEvent
  | ModelCallEvent
  | ToolCallEvent
  | ToolResultEvent
  | FinalizeEvent
  | GenerateEndEvent;

export interface GenerateStartEvent {
  type: 'generate_start';
  query: string;
  toolsEnabled: boolean;
  timestamp: number;
}

export interface ModelCallEvent {
  type: 'model_call';
  /** Tool rounds completed before this call */
  round: number;
  toolsEnabled: boolean;
}

export interface ToolCallEvent {
  type: 'tool_call';
  round: number;
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultEvent {
  type: 'tool_result';
  round: number;
  id: string;
  name: string;
  isError: boolean;
  duration: number;
}

export interface FinalizeEvent {
  type: 'finalize';
  reason: FinalizeReason;
  rounds: number;
}

export interface GenerateEndEvent {
  type: 'generate_end';
  duration: number;
  rounds: number;
  modelCalls: number;
  /** Token usage summed over every model call of the query */
  usage: TokenUsage;
}

/**
 * Event handler type
 */
export type EventHandler = (event: AgentEvent) => void;
