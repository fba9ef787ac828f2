/**
 * Course Assistant
 *
 * Answers one question end to end: builds the tool set, runs the
 * orchestrator, then drains and resets the citations. Questions asked under
 * a session id see the session's recent exchanges.
 */

import type { ToolDefinition } from '../llm/types.js';
import type { RetrievalBackend } from '../retrieval/types.js';
import type { ToolRegistryConfig } from '../tools/types.js';
import type { AssistantAnswer } from './types.js';
import type { Orchestrator } from './orchestrator.js';
import { ToolRegistry } from '../tools/registry.js';
import { createCourseTools } from '../tools/builtin/index.js';
import { SessionStore } from './session-store.js';
import { getLogger } from '../utils/logger.js';

export interface AskOptions {
  /** Explicit history; takes precedence over the session's */
  conversationHistory?: string;
  sessionId?: string;
}

export class CourseAssistant {
  constructor(
    private orchestrator: Orchestrator,
    private backend: RetrievalBackend,
    private toolConfig: ToolRegistryConfig = {},
    private sessions: SessionStore = new SessionStore()
  ) {}

  createSession(): string {
    return this.sessions.createSession();
  }

  /**
   * A fresh registry per query keeps citations of concurrent queries apart
   */
  createRegistry(): ToolRegistry {
    const registry = new ToolRegistry(this.toolConfig);
    registry.registerAll(createCourseTools(this.backend));
    return registry;
  }

  getToolDefinitions(): ToolDefinition[] {
    return this.createRegistry().getToolDefinitions();
  }

  async ask(query: string, options: AskOptions = {}): Promise<AssistantAnswer> {
    const registry = this.createRegistry();

    const { sessionId } = options;
    const conversationHistory =
      options.conversationHistory ??
      (sessionId !== undefined ? this.sessions.getConversationHistory(sessionId) : undefined);

    const answer = await this.orchestrator.generate(query, {
      conversationHistory,
      tools: registry.getToolDefinitions(),
      toolExecutor: registry,
    });

    const sources = registry.getLastSources();
    registry.resetSources();

    if (sessionId !== undefined) {
      this.sessions.addExchange(sessionId, query, answer);
    }

    getLogger().info({ sources: sources.length, sessionId }, 'Query answered');
    return sessionId !== undefined ? { answer, sources, sessionId } : { answer, sources };
  }
}
