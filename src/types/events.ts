/**
 * Detent Panels Event Types
 *
 * Typed event payloads for all panel events.
 */

import type { PanelEvent, PanelEventType, PanelEventSource } from './contracts';

// ============================================================================
// Event Payload Types
// ============================================================================

// --- Gesture Events ---

export interface DragStartPayload {
  detentId: string;
  containerExtent: number;
}

export interface DragEndPayload {
  fromDetentId: string;
  toDetentId: string;
  offset: number;
  velocity: number;
  projectedExtent: number;
  decision: 'velocity' | 'nearest';
}

export interface DragCancelPayload {
  detentId: string;
  offset: number;
}

// --- Settling ---

export interface DetentChangePayload {
  fromDetentId: string;
  toDetentId: string;
  extent: number;
}

// --- Presentation ---

export interface PresentedPayload {
  detentId: string;
}

export interface DismissedPayload {
  reason: 'command' | 'backdrop' | 'drag';
}

// --- Errors ---

export interface PanelErrorPayload {
  errorId: string;
  errorCode: string;
  message: string;
  severity: string;
}

// --- Menu ---

export interface MenuPresentedPayload {
  itemCount: number;
}

export interface MenuDismissedPayload {
  reason: 'command' | 'outside' | 'drag' | 'action';
}

export interface MenuActionPayload {
  itemId: string;
}

/**
 * Map of event types to payloads
 */
export interface PanelEventPayloadMap {
  'panel:drag_start': DragStartPayload;
  'panel:drag_end': DragEndPayload;
  'panel:drag_cancel': DragCancelPayload;
  'panel:detent_change': DetentChangePayload;
  'panel:presented': PresentedPayload;
  'panel:dismissed': DismissedPayload;
  'panel:error': PanelErrorPayload;
  'menu:presented': MenuPresentedPayload;
  'menu:dismissed': MenuDismissedPayload;
  'menu:action': MenuActionPayload;
}

// ============================================================================
// Event Factory
// ============================================================================

/**
 * Create a typed panel event
 */
export function createPanelEvent<T extends PanelEventType>(
  type: T,
  payload: PanelEventPayloadMap[T],
  panelId: string,
  source: PanelEventSource = 'system'
): PanelEvent<PanelEventPayloadMap[T]> {
  return {
    type,
    payload,
    panelId,
    timestamp: Date.now(),
    source,
  };
}

/**
 * Type guard to check if event matches expected type
 */
export function isEventType<T extends PanelEventType>(
  event: PanelEvent<unknown>,
  type: T
): event is PanelEvent<PanelEventPayloadMap[T]> {
  return event.type === type;
}
