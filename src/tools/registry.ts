/**
 * Tool Registry
 */

import type { ToolDefinition } from '../llm/types.js';
import type { Source, Tool, ToolRegistryConfig } from './types.js';
import { toToolDefinition } from './types.js';
import { ToolError } from '../errors/types.js';
import { getLogger } from '../utils/logger.js';

/**
 * Tool Registry manages available tools and the sources recorded by their
 * executions. It holds per-query state: use one registry per in-flight query.
 */
export class ToolRegistry {
  private tools: Map<string, Tool> = new Map();
  private lastSources: Source[] = [];
  private config: ToolRegistryConfig;

  constructor(config: ToolRegistryConfig = {}) {
    this.config = config;
  }

  /**
   * Register a tool. A second tool under the same name replaces the first
   * and keeps its place in the registration order.
   */
  register(tool: Tool): void {
    const logger = getLogger();

    if (this.config.disabledTools?.includes(tool.name)) {
      logger.debug({ tool: tool.name }, 'Tool disabled by config');
      return;
    }

    if (
      this.config.enabledTools &&
      this.config.enabledTools.length > 0 &&
      !this.config.enabledTools.includes(tool.name)
    ) {
      logger.debug({ tool: tool.name }, 'Tool not in enabled list');
      return;
    }

    if (this.tools.has(tool.name)) {
      logger.warn({ tool: tool.name }, 'Tool already registered, overwriting');
    }

    this.tools.set(tool.name, tool);
    logger.debug({ tool: tool.name }, 'Tool registered');
  }

  /**
   * Register multiple tools
   */
  registerAll(tools: Tool[]): void {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getAll(): Tool[] {
    return Array.from(this.tools.values());
  }

  getNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Definitions for the completion service, in registration order
   */
  getToolDefinitions(): ToolDefinition[] {
    return this.getAll().map(toToolDefinition);
  }

  /**
   * Run a tool by name. Unknown names and tool failures reject.
   */
  async execute(name: string, input: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new ToolError(
        `Unknown tool '${name}'. Available tools: ${this.getNames().join(', ')}`,
        'not_found',
        name
      );
    }

    const output = await tool.execute(input);
    const recorded = tool.getLastSources();
    this.lastSources.push(...recorded);

    getLogger().debug({ tool: name, sources: recorded.length }, 'Tool executed');
    return output;
  }

  /**
   * Sources of every execution since the last reset, in execution order
   */
  getLastSources(): Source[] {
    return [...this.lastSources];
  }

  resetSources(): void {
    this.lastSources = [];
    for (const tool of this.tools.values()) {
      tool.resetSources();
    }
  }
}
