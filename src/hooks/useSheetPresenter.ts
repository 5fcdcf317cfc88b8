/**
 * useSheetPresenter Hook
 *
 * Owns a SheetPresenter for the lifetime of a component and exposes
 * its render frame as React state.
 */

import { useEffect, useMemo, useRef, useState } from 'react';
import { useStore } from 'zustand';
import {
  SheetPresenter,
  buildSheetFrame,
  type SheetFrame,
  type SheetPresenterOptions,
} from '../systems/SheetPresenter';

/**
 * Hook return value
 */
export interface UseSheetPresenterResult {
  presenter: SheetPresenter;
  frame: SheetFrame;
}

/**
 * Create a presenter once and follow its state.
 *
 * Options are read at creation; later changes to `reduceMotion` and
 * `onDismiss` are applied to the live presenter.
 *
 * @example
 * ```tsx
 * const { presenter, frame } = useSheetPresenter({
 *   detents: [Detents.small, Detents.medium, Detents.large],
 *   initialDetent: Detents.medium,
 * });
 * ```
 */
export function useSheetPresenter(options: SheetPresenterOptions = {}): UseSheetPresenterResult {
  const optionsRef = useRef(options);
  optionsRef.current = options;

  // StrictMode may call the initializer twice and drop one result, so the
  // store is only registered once the presenter is committed
  const [presenter, setPresenter] = useState(() => createUnregistered(options));

  // Recreate after a dispose/remount cycle (StrictMode runs effects twice)
  useEffect(() => {
    if (presenter.isDisposed) {
      setPresenter(createUnregistered(optionsRef.current));
      return;
    }
    presenter.controller.registerStore();
    return () => presenter.dispose();
  }, [presenter]);

  const { reduceMotion, onDismiss } = options;

  useEffect(() => {
    if (reduceMotion !== undefined) {
      presenter.setReduceMotion(reduceMotion);
    }
  }, [presenter, reduceMotion]);

  useEffect(() => {
    presenter.setOnDismiss(onDismiss);
  }, [presenter, onDismiss]);

  const panel = useStore(presenter.controller.store);
  const presentation = useStore(presenter.presentationStore);

  const frame = useMemo(
    () => buildSheetFrame(panel, presentation, presenter.configuration),
    [panel, presentation, presenter.configuration]
  );

  return { presenter, frame };
}

function createUnregistered(options: SheetPresenterOptions): SheetPresenter {
  return new SheetPresenter({ ...options, registerStore: false });
}

export default useSheetPresenter;
