/**
 * Detent Panels Contracts
 *
 * Event and subscription contracts shared by controllers,
 * presenters and the event bus.
 */

// ============================================================================
// Events
// ============================================================================

/**
 * Event types that flow through the panel event bus
 */
export type PanelEventType =
  // Gesture lifecycle
  | 'panel:drag_start'
  | 'panel:drag_end'
  | 'panel:drag_cancel'
  // Settling
  | 'panel:detent_change'
  // Presentation
  | 'panel:presented'
  | 'panel:dismissed'
  // Errors
  | 'panel:error'
  // Slide-in menu
  | 'menu:presented'
  | 'menu:dismissed'
  | 'menu:action';

/**
 * Who caused an event
 */
export type PanelEventSource = 'gesture' | 'command' | 'system';

/**
 * Event envelope
 */
export interface PanelEvent<T = unknown> {
  /** Event type identifier */
  type: PanelEventType;
  /** Event payload */
  payload: T;
  /** Panel that emitted the event */
  panelId: string;
  /** Unix timestamp when the event was created */
  timestamp: number;
  /** What triggered the event */
  source: PanelEventSource;
}

/**
 * Handler function type for panel events
 */
export type PanelEventHandler<T = unknown> = (event: PanelEvent<T>) => void;

/**
 * Unsubscribe function returned by subscribe
 */
export type Unsubscribe = () => void;

// ============================================================================
// Controller Contract
// ============================================================================

/**
 * Gesture sink implemented by anything that accepts drag input
 */
export interface DragGestureSink {
  beginDrag(): void;
  dragUpdate(deltaExtent: number): void;
  dragEnd(velocity: number): void;
  cancelDrag(): void;
}

/**
 * Lifecycle contract for objects owning subscriptions
 */
export interface Disposable {
  dispose(): void;
  readonly isDisposed: boolean;
}
