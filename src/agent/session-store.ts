/**
 * Session Store
 *
 * In-memory conversation history per session. Only the most recent
 * exchanges are kept; they reach the model as the history block of the
 * system text.
 */

import { nanoid } from 'nanoid';
import { getLogger } from '../utils/logger.js';

export const DEFAULT_MAX_HISTORY = 2;

export interface Exchange {
  user: string;
  assistant: string;
}

export class SessionStore {
  private sessions: Map<string, Exchange[]> = new Map();

  constructor(private maxHistory: number = DEFAULT_MAX_HISTORY) {}

  createSession(): string {
    const sessionId = `session_${nanoid(10)}`;
    this.sessions.set(sessionId, []);
    getLogger().debug({ sessionId }, 'Session created');
    return sessionId;
  }

  /**
   * Record one question and its answer, dropping the oldest beyond maxHistory
   */
  addExchange(sessionId: string, user: string, assistant: string): void {
    const exchanges = [...(this.sessions.get(sessionId) ?? []), { user, assistant }];
    this.sessions.set(sessionId, this.maxHistory > 0 ? exchanges.slice(-this.maxHistory) : []);
  }

  getExchanges(sessionId: string): Exchange[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  /**
   * History text for the system prompt, or undefined for an empty session
   */
  getConversationHistory(sessionId: string): string | undefined {
    const exchanges = this.sessions.get(sessionId);
    if (!exchanges || exchanges.length === 0) {
      return undefined;
    }
    return exchanges
      .map(exchange => `User: ${exchange.user}\nAssistant: ${exchange.assistant}`)
      .join('\n');
  }

  clearSession(sessionId: string): void {
    this.sessions.delete(sessionId);
  }
}
