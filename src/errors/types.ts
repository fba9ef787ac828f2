/**
 * Error Types
 */

export type LLMErrorType =
  | 'rate_limit'
  | 'timeout'
  | 'service_unavailable'
  | 'invalid_request'
  | 'auth_error'
  | 'context_overflow'
  | 'unknown';

export type ToolErrorType =
  | 'not_found'
  | 'invalid_params'
  | 'execution_failed'
  | 'unknown';

export type RetrievalErrorType =
  | 'catalog_not_found'
  | 'invalid_catalog';

/**
 * Base error class for Lectern
 */
export class LecternError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = 'LecternError';
  }
}

/**
 * Completion transport errors. These are never caught by the orchestrator.
 */
export class LLMError extends LecternError {
  constructor(
    message: string,
    public readonly type: LLMErrorType,
    retryAfter?: number
  ) {
    const recoverable = ['rate_limit', 'timeout', 'service_unavailable'].includes(type);
    super(message, `llm_${type}`, recoverable, retryAfter);
    this.name = 'LLMError';
  }
}

/**
 * Tool execution errors
 */
export class ToolError extends LecternError {
  constructor(
    message: string,
    public readonly type: ToolErrorType,
    public readonly toolName: string
  ) {
    super(message, `tool_${type}`, false);
    this.name = 'ToolError';
  }
}

/**
 * Course catalog loading errors
 */
export class RetrievalError extends LecternError {
  constructor(
    message: string,
    public readonly type: RetrievalErrorType
  ) {
    super(message, `retrieval_${type}`, false);
    this.name = 'RetrievalError';
  }
}

/**
 * Configuration errors
 */
export class ConfigError extends LecternError {
  constructor(message: string) {
    super(message, 'config_error', false);
    this.name = 'ConfigError';
  }
}

/**
 * Readable message for any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
