/**
 * Panel Event Bus
 *
 * Local event bus for the panel layer.
 * Controllers, presenters and menus publish their lifecycle here.
 */

import type {
  PanelEvent,
  PanelEventType,
  PanelEventHandler,
  Unsubscribe,
} from '../types/contracts';
import { isEventType, type PanelEventPayloadMap } from '../types/events';

/**
 * Event bus configuration
 */
interface EventBusConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Maximum listeners per event type (warns past this) */
  maxListeners?: number;
  /** Event history size for debugging */
  historySize?: number;
}

/**
 * Event history entry
 */
export interface EventHistoryEntry {
  event: PanelEvent<unknown>;
  timestamp: number;
  handlerCount: number;
}

/**
 * Handler for a specific event type
 */
export type TypedPanelEventHandler<K extends PanelEventType> = (
  event: PanelEvent<PanelEventPayloadMap[K]>
) => void;

/**
 * PanelEventBus - event routing for the panel layer
 */
class PanelEventBusImpl {
  private listeners: Map<PanelEventType, Set<PanelEventHandler<unknown>>> = new Map();
  private wildcardListeners: Set<PanelEventHandler<unknown>> = new Set();
  private history: EventHistoryEntry[] = [];
  private config: Required<EventBusConfig>;
  private isPaused: boolean = false;
  private queuedEvents: PanelEvent<unknown>[] = [];

  constructor(config: EventBusConfig = {}) {
    this.config = {
      debug: config.debug ?? false,
      maxListeners: config.maxListeners ?? 100,
      historySize: config.historySize ?? 50,
    };
  }

  /**
   * Subscribe to a specific event type
   */
  subscribe<K extends PanelEventType>(
    eventType: K,
    handler: TypedPanelEventHandler<K>
  ): Unsubscribe {
    let handlers = this.listeners.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.listeners.set(eventType, handlers);
    }

    if (handlers.size >= this.config.maxListeners) {
      console.warn(
        `[PanelEventBus] Max listeners (${this.config.maxListeners}) reached for event type "${eventType}"`
      );
    }

    const wrapped: PanelEventHandler<unknown> = (event) => {
      if (isEventType(event, eventType)) {
        handler(event);
      }
    };
    handlers.add(wrapped);

    if (this.config.debug) {
      console.log(`[PanelEventBus] Subscribed to "${eventType}" (${handlers.size} listeners)`);
    }

    const owner = handlers;
    return () => {
      owner.delete(wrapped);
      if (this.config.debug) {
        console.log(`[PanelEventBus] Unsubscribed from "${eventType}" (${owner.size} listeners)`);
      }
    };
  }

  /**
   * Alias for subscribe (event emitter style)
   */
  on<K extends PanelEventType>(eventType: K, handler: TypedPanelEventHandler<K>): Unsubscribe {
    return this.subscribe(eventType, handler);
  }

  /**
   * Subscribe to an event type for a single emission only
   */
  once<K extends PanelEventType>(
    eventType: K,
    handler: TypedPanelEventHandler<K>
  ): Unsubscribe {
    const unsubscribe = this.subscribe(eventType, (event) => {
      unsubscribe();
      handler(event);
    });
    return unsubscribe;
  }

  /**
   * Subscribe one handler to several event types
   */
  subscribeMany(
    eventTypes: PanelEventType[],
    handler: PanelEventHandler<unknown>
  ): Unsubscribe {
    const unsubscribes = eventTypes.map((type) => this.subscribe(type, handler));

    return () => {
      unsubscribes.forEach((unsub) => unsub());
    };
  }

  /**
   * Subscribe to all events (wildcard)
   */
  subscribeAll(handler: PanelEventHandler<unknown>): Unsubscribe {
    this.wildcardListeners.add(handler);

    return () => {
      this.wildcardListeners.delete(handler);
    };
  }

  /**
   * Emit an event synchronously
   */
  emit(event: PanelEvent<unknown>): void {
    if (this.isPaused) {
      this.queuedEvents.push(event);
      return;
    }

    const handlers = this.listeners.get(event.type) ?? new Set<PanelEventHandler<unknown>>();
    const handlerCount = handlers.size + this.wildcardListeners.size;

    this.addToHistory(event, handlerCount);

    if (this.config.debug) {
      console.log(`[PanelEventBus] Emit "${event.type}"`, {
        payload: event.payload,
        panelId: event.panelId,
        handlers: handlerCount,
      });
    }

    // Copy so handlers may unsubscribe while we iterate
    for (const handler of [...handlers]) {
      try {
        handler(event);
      } catch (error) {
        console.error(`[PanelEventBus] Handler error for "${event.type}":`, error);
      }
    }

    for (const handler of [...this.wildcardListeners]) {
      try {
        handler(event);
      } catch (error) {
        console.error('[PanelEventBus] Wildcard handler error:', error);
      }
    }
  }

  /**
   * Pause event emission (queues events)
   */
  pause(): void {
    this.isPaused = true;
    if (this.config.debug) {
      console.log('[PanelEventBus] Paused');
    }
  }

  /**
   * Resume event emission and flush queued events in order
   */
  resume(): void {
    this.isPaused = false;
    if (this.config.debug) {
      console.log(`[PanelEventBus] Resumed (${this.queuedEvents.length} queued events)`);
    }

    const queued = [...this.queuedEvents];
    this.queuedEvents = [];

    for (const event of queued) {
      this.emit(event);
    }
  }

  /**
   * Get event history
   */
  getHistory(): EventHistoryEntry[] {
    return [...this.history];
  }

  /**
   * Clear event history
   */
  clearHistory(): void {
    this.history = [];
  }

  /**
   * Get listener count for an event type (wildcards included)
   */
  getListenerCount(eventType: PanelEventType): number {
    return (this.listeners.get(eventType)?.size ?? 0) + this.wildcardListeners.size;
  }

  /**
   * Remove all listeners
   */
  clear(): void {
    this.listeners.clear();
    this.wildcardListeners.clear();
    this.queuedEvents = [];
    this.isPaused = false;
    if (this.config.debug) {
      console.log('[PanelEventBus] Cleared all listeners');
    }
  }

  /**
   * Enable/disable debug mode
   */
  setDebug(enabled: boolean): void {
    this.config.debug = enabled;
  }

  private addToHistory(event: PanelEvent<unknown>, handlerCount: number): void {
    this.history.push({
      event,
      timestamp: Date.now(),
      handlerCount,
    });

    if (this.history.length > this.config.historySize) {
      this.history = this.history.slice(-this.config.historySize);
    }
  }
}

/**
 * Shared event bus instance
 */
export const PanelEventBus = new PanelEventBusImpl({
  debug: process.env.NODE_ENV === 'development',
  maxListeners: 100,
  historySize: 50,
});

/**
 * Create a new event bus instance (for testing or isolation)
 */
export function createPanelEventBus(config?: EventBusConfig): PanelEventBusImpl {
  return new PanelEventBusImpl(config);
}

export type { PanelEventBusImpl, EventBusConfig };
