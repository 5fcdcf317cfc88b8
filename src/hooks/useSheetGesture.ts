/**
 * useSheetGesture Hook
 *
 * Maps pointer events on a sheet to drag input: vertical deltas while the
 * pointer is down, and a release velocity from the trailing samples.
 */

import { useCallback, useMemo, useRef } from 'react';
import { VelocityTracker } from '../systems/VelocityTracker';
import type { DragGestureSink } from '../types/contracts';

/**
 * Subset of a pointer event the gesture reads
 */
export interface GesturePointerEvent {
  clientY: number;
  timeStamp: number;
  pointerId?: number;
  currentTarget?: {
    setPointerCapture?: (pointerId: number) => void;
  } | null;
}

/**
 * Gesture options
 */
export interface SheetGestureOptions {
  /** Drag input receiver (presenter or controller) */
  sink: DragGestureSink;
  /** Whether gestures are accepted */
  enabled?: boolean;
}

/**
 * Pointer handlers to spread onto the draggable element
 */
export interface SheetGestureHandlers {
  onPointerDown: (event: GesturePointerEvent) => void;
  onPointerMove: (event: GesturePointerEvent) => void;
  onPointerUp: (event: GesturePointerEvent) => void;
  onPointerCancel: () => void;
  /** Whether the last pointer sequence moved (a tap should then be ignored) */
  didDrag: () => boolean;
}

/**
 * Drag gesture for bottom-anchored sheets
 *
 * Screen y grows downward, so a positive delta shrinks the sheet and an
 * upward flick produces a negative velocity.
 */
export function useSheetGesture({ sink, enabled = true }: SheetGestureOptions): SheetGestureHandlers {
  const trackerRef = useRef<VelocityTracker | null>(null);
  const lastYRef = useRef<number | null>(null);
  const movedRef = useRef(false);

  const getTracker = useCallback((): VelocityTracker => {
    if (!trackerRef.current) {
      trackerRef.current = new VelocityTracker();
    }
    return trackerRef.current;
  }, []);

  const onPointerDown = useCallback(
    (event: GesturePointerEvent) => {
      if (!enabled) return;

      if (event.pointerId !== undefined) {
        event.currentTarget?.setPointerCapture?.(event.pointerId);
      }

      const tracker = getTracker();
      tracker.reset();
      tracker.addSample(event.clientY, event.timeStamp);
      lastYRef.current = event.clientY;
      movedRef.current = false;
      sink.beginDrag();
    },
    [enabled, sink, getTracker]
  );

  const onPointerMove = useCallback(
    (event: GesturePointerEvent) => {
      const lastY = lastYRef.current;
      if (lastY === null) return;

      if (event.clientY === lastY) return;

      lastYRef.current = event.clientY;
      movedRef.current = true;
      getTracker().addSample(event.clientY, event.timeStamp);
      sink.dragUpdate(event.clientY - lastY);
    },
    [sink, getTracker]
  );

  const onPointerUp = useCallback(
    (event: GesturePointerEvent) => {
      const lastY = lastYRef.current;
      if (lastY === null) return;

      lastYRef.current = null;
      const tracker = getTracker();
      if (event.clientY !== lastY) {
        movedRef.current = true;
        tracker.addSample(event.clientY, event.timeStamp);
        sink.dragUpdate(event.clientY - lastY);
      }
      sink.dragEnd(tracker.getVelocity(event.timeStamp));
      tracker.reset();
    },
    [sink, getTracker]
  );

  const onPointerCancel = useCallback(() => {
    if (lastYRef.current === null) return;
    lastYRef.current = null;
    getTracker().reset();
    sink.cancelDrag();
  }, [sink, getTracker]);

  const didDrag = useCallback(() => movedRef.current, []);

  return useMemo(
    () => ({ onPointerDown, onPointerMove, onPointerUp, onPointerCancel, didDrag }),
    [onPointerDown, onPointerMove, onPointerUp, onPointerCancel, didDrag]
  );
}

export default useSheetGesture;
