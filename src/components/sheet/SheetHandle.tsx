/**
 * Sheet Handle
 *
 * Grabber shown at the top of a bottom sheet. Tapping it cycles detents;
 * arrow keys expand and collapse.
 */

import React, { useCallback } from 'react';
import { motion } from 'framer-motion';
import { PANEL_TIMING, springTransition } from '../../types/common';
import { toMotionTransition } from '../../utils/surfaceStyles';
import type { AdjustDirection } from '../../systems/SheetPresenter';
import styles from './SheetHandle.module.css';

export interface SheetHandleProps {
  color: string;
  width: number;
  height: number;
  /** Current detent, read out as the handle's value */
  valueText: string;
  onTap: () => void;
  onAdjust: (direction: AdjustDirection) => void;
}

const HANDLE_TAP_TRANSITION = toMotionTransition(
  springTransition({
    response: PANEL_TIMING.handleResponse,
    dampingFraction: PANEL_TIMING.handleDampingFraction,
  })
);

export const SheetHandle: React.FC<SheetHandleProps> = ({
  color,
  width,
  height,
  valueText,
  onTap,
  onAdjust,
}) => {
  const handleKeyDown = useCallback(
    (event: React.KeyboardEvent<HTMLButtonElement>) => {
      if (event.key === 'ArrowUp') {
        event.preventDefault();
        onAdjust('increment');
      } else if (event.key === 'ArrowDown') {
        event.preventDefault();
        onAdjust('decrement');
      }
    },
    [onAdjust]
  );

  return (
    <motion.button
      type="button"
      className={styles.hitArea}
      aria-label="Sheet handle"
      title={`${valueText}. Tap to resize the sheet`}
      onClick={onTap}
      onKeyDown={handleKeyDown}
      whileTap={{ scale: 1.1 }}
      transition={HANDLE_TAP_TRANSITION}
    >
      <span
        className={styles.grabber}
        style={{ width, height, borderRadius: height / 2, background: color }}
      />
    </motion.button>
  );
};

export default SheetHandle;
