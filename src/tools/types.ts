/**
 * Tool System Types
 */

import type { ToolDefinition, ToolInputSchema } from '../llm/types.js';

/**
 * Tool parameter definition
 */
export interface ToolParameter {
  type: 'string' | 'number' | 'integer' | 'boolean';
  description: string;
  required?: boolean;
  enum?: string[];
}

/**
 * A citation shown to the end user next to an answer
 */
export interface Source {
  readonly text: string;
  readonly link?: string;
}

/**
 * Tool definition
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly parameters: Record<string, ToolParameter>;

  /**
   * Execute the tool. The returned text is fed back to the model.
   */
  execute(input: Record<string, unknown>): Promise<string>;

  /**
   * Sources recorded by the most recent execution
   */
  getLastSources(): Source[];

  resetSources(): void;
}

/**
 * Tool registry configuration
 */
export interface ToolRegistryConfig {
  enabledTools?: string[];
  disabledTools?: string[];
}

export const COURSE_TOOLS = {
  SEARCH_CONTENT: 'search_course_content',
  COURSE_OUTLINE: 'get_course_outline',
} as const;

/**
 * Convert tool to the definition sent to the completion service
 */
export function toToolDefinition(tool: Tool): ToolDefinition {
  const properties: ToolInputSchema['properties'] = {};
  const required: string[] = [];

  for (const [name, param] of Object.entries(tool.parameters)) {
    properties[name] = {
      type: param.type,
      description: param.description,
    };
    if (param.enum) {
      properties[name].enum = param.enum;
    }
    if (param.required) {
      required.push(name);
    }
  }

  return {
    name: tool.name,
    description: tool.description,
    inputSchema: {
      type: 'object',
      properties,
      required,
    },
  };
}
