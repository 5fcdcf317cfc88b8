/**
 * Bottom Sheet
 *
 * Detent-based sheet anchored to the bottom of its container. Height
 * follows the controller's display extent; releases settle with the
 * configured spring.
 */

import React, { useCallback, useEffect, useRef } from 'react';
import { AnimatePresence, motion } from 'framer-motion';
import { useSheetPresenter } from '../../hooks/useSheetPresenter';
import { useSheetGesture } from '../../hooks/useSheetGesture';
import { getDetentId } from '../../types/detent';
import { backgroundCss, shadowCss, toMotionTransition } from '../../utils/surfaceStyles';
import type { SheetFrame, SheetPresenterOptions } from '../../systems/SheetPresenter';
import { SheetHandle } from './SheetHandle';
import styles from './BottomSheet.module.css';

/**
 * BottomSheet props
 */
export interface BottomSheetProps extends SheetPresenterOptions {
  /** Presented state; when set, the sheet follows it */
  isPresented?: boolean;
  /** Container height; measured from the wrapper when omitted */
  containerExtent?: number;
  /** Sheet content, or a render function receiving the current frame */
  children?: React.ReactNode | ((frame: SheetFrame) => React.ReactNode);
  className?: string;
  'aria-label'?: string;
}

/**
 * BottomSheet component
 *
 * @example
 * ```tsx
 * <BottomSheet
 *   detents={[Detents.small, Detents.medium, Detents.large]}
 *   isPresented={open}
 *   onDismiss={() => setOpen(false)}
 * >
 *   <RouteDetails />
 * </BottomSheet>
 * ```
 */
export const BottomSheet: React.FC<BottomSheetProps> = (props) => {
  const {
    isPresented,
    containerExtent,
    children,
    className = '',
    'aria-label': ariaLabel = 'Sheet',
    ...presenterOptions
  } = props;

  const { presenter, frame } = useSheetPresenter({ ...presenterOptions, isPresented, containerExtent });
  const gesture = useSheetGesture({ sink: presenter, enabled: frame.isPresented });
  const containerRef = useRef<HTMLDivElement>(null);

  // Follow the controlled presented state
  useEffect(() => {
    if (isPresented === undefined || presenter.isDisposed) return;
    if (isPresented) {
      presenter.present();
    } else {
      presenter.dismiss('command');
    }
  }, [presenter, isPresented]);

  // Keep the container extent current
  useEffect(() => {
    if (presenter.isDisposed) return;

    if (containerExtent !== undefined) {
      presenter.setContainerExtent(containerExtent);
      return;
    }

    const element = containerRef.current;
    if (!element) return;

    presenter.setContainerExtent(element.getBoundingClientRect().height);

    if (typeof ResizeObserver === 'undefined') return;

    const observer = new ResizeObserver((entries) => {
      for (const entry of entries) {
        presenter.setContainerExtent(entry.contentRect.height);
      }
    });
    observer.observe(element);

    return () => observer.disconnect();
  }, [presenter, containerExtent]);

  const handleTap = useCallback(() => {
    if (!gesture.didDrag()) {
      presenter.tapHandle();
    }
  }, [gesture, presenter]);

  const { configuration } = presenter;
  const isModal = presenter.presentation === 'modal';
  const transition = toMotionTransition(frame.transition);

  return (
    <div ref={containerRef} className={`${styles.container} ${className}`}>
      <AnimatePresence>
        {frame.isPresented && frame.backdropOpacity > 0 && (
          <motion.div
            key="backdrop"
            className={styles.backdrop}
            data-testid="sheet-backdrop"
            initial={{ opacity: 0 }}
            animate={{ opacity: frame.backdropOpacity }}
            exit={{ opacity: 0 }}
            transition={transition}
            onClick={() => presenter.tapBackdrop()}
          />
        )}

        {frame.isPresented && (
          <motion.section
            key="sheet"
            className={styles.sheet}
            role={isModal ? 'dialog' : 'region'}
            aria-modal={isModal ? true : undefined}
            aria-label={ariaLabel}
            data-detent={getDetentId(frame.currentDetent)}
            data-phase={frame.phase}
            initial={{ height: 0 }}
            animate={{ height: frame.displayExtent }}
            exit={{ height: 0 }}
            transition={transition}
            style={{
              ...backgroundCss(configuration.backgroundStyle),
              borderTopLeftRadius: frame.cornerRadius,
              borderTopRightRadius: frame.cornerRadius,
              boxShadow: shadowCss(configuration.shadow),
              accentColor: configuration.accentColor,
            }}
            onPointerDown={gesture.onPointerDown}
            onPointerMove={gesture.onPointerMove}
            onPointerUp={gesture.onPointerUp}
            onPointerCancel={gesture.onPointerCancel}
          >
            {frame.showHandle && (
              <SheetHandle
                color={configuration.handleColor}
                width={configuration.handleWidth}
                height={configuration.handleHeight}
                valueText={frame.detentDescription}
                onTap={handleTap}
                onAdjust={(direction) => presenter.adjust(direction)}
              />
            )}
            <div className={styles.content}>
              {typeof children === 'function' ? children(frame) : children}
            </div>
          </motion.section>
        )}
      </AnimatePresence>
    </div>
  );
};

export default BottomSheet;
