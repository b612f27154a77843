/**
 * ActivityStream - Structured audit events for tool dispatch, security
 * decisions and network resilience
 *
 * Subscribers register per event type or with '*' for everything. A throwing
 * listener is logged and skipped; it never affects the emitter.
 */

import { ActivityEvent, ActivityEventType, ActivityCallback } from '../types/index.js';
import { logger } from './Logger.js';
import { generateId } from '../utils/id.js';

export class ActivityStream {
  private listeners: Map<ActivityEventType | '*', Set<ActivityCallback>>;

  /**
   * Listener count per type above which a leak warning is logged
   */
  private readonly MAX_LISTENERS_PER_TYPE = 50;

  constructor() {
    this.listeners = new Map();
  }

  /**
   * Emit an event to all registered listeners.
   * Type-specific listeners run before wildcard listeners.
   */
  emit(event: ActivityEvent): void {
    this.deliver(this.listeners.get(event.type), event);
    this.deliver(this.listeners.get('*'), event);
  }

  /**
   * Build and emit an event in one step
   */
  record(type: ActivityEventType, data: Record<string, unknown>): ActivityEvent {
    const event: ActivityEvent = {
      id: generateId('evt'),
      type,
      timestamp: Date.now(),
      data,
    };
    this.emit(event);
    return event;
  }

  private deliver(callbacks: Set<ActivityCallback> | undefined, event: ActivityEvent): void {
    if (!callbacks) {
      return;
    }
    for (const callback of callbacks) {
      try {
        callback(event);
      } catch (error) {
        logger.error('[ACTIVITY_STREAM] Error in activity stream listener:', error);
      }
    }
  }

  /**
   * Subscribe to a specific event type, or '*' for all events
   *
   * @returns Unsubscribe function
   *
   * @example
   * ```typescript
   * const unsubscribe = stream.subscribe(ActivityEventType.ACCESS_DENIED, (event) => {
   *   console.error('denied:', event.data.path);
   * });
   * unsubscribe();
   * ```
   */
  subscribe(eventType: ActivityEventType | '*', callback: ActivityCallback): () => void {
    let callbacks = this.listeners.get(eventType);
    if (!callbacks) {
      callbacks = new Set();
      this.listeners.set(eventType, callbacks);
    }
    callbacks.add(callback);

    if (callbacks.size > this.MAX_LISTENERS_PER_TYPE) {
      logger.warn(
        `[ACTIVITY_STREAM] High listener count (${callbacks.size}) for event type '${eventType}'. ` +
          `Ensure all subscribers call unsubscribe() when done.`
      );
    }

    const owned = callbacks;
    return () => {
      owned.delete(callback);
      if (owned.size === 0) {
        this.listeners.delete(eventType);
      }
    };
  }

  cleanup(): void {
    this.listeners.clear();
  }

  getListenerCount(): number {
    let count = 0;
    this.listeners.forEach(callbacks => {
      count += callbacks.size;
    });
    return count;
  }
}
