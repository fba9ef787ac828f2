/**
 * Event Emitter
 */

import type { AgentEvent, EventHandler } from './types.js';
import { getLogger } from '../utils/logger.js';

/**
 * Typed event emitter for orchestration events
 */
export class EventEmitter {
  private handlers: Set<EventHandler> = new Set();

  /**
   * Subscribe to all events
   */
  subscribe(handler: EventHandler): () => void {
    this.handlers.add(handler);
    return () => this.handlers.delete(handler);
  }

  /**
   * Emit an event to all subscribers. A throwing handler is logged and
   * does not affect the others or the emitter's caller.
   */
  emit(event: AgentEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        getLogger().error({ err: error, event: event.type }, 'Event handler error');
      }
    }
  }
}
