/**
 * Slide Menu
 *
 * Menu that slides in from the trailing edge (or up from the bottom) over
 * a dimmed backdrop. Dragging toward the entry edge dismisses it.
 */

import React, { useCallback, useEffect, useRef } from 'react';
import { AnimatePresence, motion } from 'framer-motion';
import { useSlideMenu } from '../../hooks/useSlideMenu';
import { isVerticalDrag, type MenuItem } from '../../types/menu';
import { backgroundCss, shadowCss, toMotionTransition } from '../../utils/surfaceStyles';
import type { SlideMenuControllerOptions } from '../../systems/SlideMenuController';
import styles from './SlideMenu.module.css';

/**
 * SlideMenu props
 */
export interface SlideMenuProps extends Omit<SlideMenuControllerOptions, 'items'> {
  items: MenuItem[];
  isPresented: boolean;
  /** Called after the menu is dismissed, whatever the reason */
  onDismiss?: () => void;
  title?: string;
  className?: string;
}

interface MenuPointerEvent {
  clientX: number;
  clientY: number;
}

/**
 * SlideMenu component
 */
export const SlideMenu: React.FC<SlideMenuProps> = ({
  items,
  isPresented,
  onDismiss,
  title,
  className = '',
  ...controllerOptions
}) => {
  const { menu, state } = useSlideMenu({ ...controllerOptions, items });
  const { configuration } = menu;
  const vertical = isVerticalDrag(configuration.presentationStyle);
  const dragStartRef = useRef<number | null>(null);
  const onDismissRef = useRef(onDismiss);
  onDismissRef.current = onDismiss;

  useEffect(() => {
    if (menu.isDisposed) return;
    if (isPresented) {
      menu.present();
    } else {
      menu.dismiss('command');
    }
  }, [menu, isPresented]);

  // Report dismissals the menu made on its own
  useEffect(
    () =>
      menu.store.subscribe(
        (current) => current.isPresented,
        (presented) => {
          if (!presented) {
            onDismissRef.current?.();
          }
        }
      ),
    [menu]
  );

  const axisPosition = useCallback(
    (event: MenuPointerEvent) => (vertical ? event.clientY : event.clientX),
    [vertical]
  );

  const handlePointerDown = useCallback(
    (event: MenuPointerEvent) => {
      dragStartRef.current = axisPosition(event);
    },
    [axisPosition]
  );

  const handlePointerMove = useCallback(
    (event: MenuPointerEvent) => {
      const start = dragStartRef.current;
      if (start === null) return;
      menu.updateDragOffset(axisPosition(event) - start);
    },
    [menu, axisPosition]
  );

  const handlePointerUp = useCallback(
    (event: MenuPointerEvent) => {
      const start = dragStartRef.current;
      if (start === null) return;
      dragStartRef.current = null;
      menu.endDrag(axisPosition(event) - start);
    },
    [menu, axisPosition]
  );

  const handlePointerCancel = useCallback(() => {
    dragStartRef.current = null;
    menu.endDrag(0);
  }, [menu]);

  const hidden = vertical ? { y: '100%' } : { x: '100%' };
  const offset = vertical ? { x: 0, y: state.dragOffset } : { x: state.dragOffset, y: 0 };

  return (
    <AnimatePresence>
      {state.isPresented && (
        <motion.div
          key="menu-backdrop"
          className={styles.backdrop}
          data-testid="menu-backdrop"
          initial={{ opacity: 0 }}
          animate={{ opacity: state.backdropOpacity }}
          exit={{ opacity: 0 }}
          transition={toMotionTransition(configuration.dismissalTransition)}
          onClick={() => menu.tapOutside()}
        />
      )}

      {state.isPresented && (
        <motion.nav
          key="menu-panel"
          className={`${vertical ? styles.bottomPanel : styles.trailingPanel} ${className}`}
          aria-label={title ?? 'Menu'}
          initial={hidden}
          animate={offset}
          exit={{ ...hidden, transition: toMotionTransition(configuration.dismissalTransition) }}
          transition={toMotionTransition(configuration.presentationTransition)}
          style={{
            ...backgroundCss(configuration.backgroundStyle),
            width: vertical ? undefined : configuration.menuWidth,
            borderRadius: configuration.cornerRadius,
            boxShadow: shadowCss(configuration.shadow),
          }}
          onPointerDown={handlePointerDown}
          onPointerMove={handlePointerMove}
          onPointerUp={handlePointerUp}
          onPointerCancel={handlePointerCancel}
        >
          {title && <h2 className={styles.title}>{title}</h2>}
          <ul className={styles.list}>
            {state.items.map((item) => (
              <li key={item.id}>
                <motion.button
                  type="button"
                  className={styles.item}
                  style={{ color: item.isDestructive ? '#FF453A' : undefined }}
                  whileTap={{ scale: 0.98 }}
                  onClick={() => menu.executeAction(item)}
                >
                  <span className={styles.itemTitle}>{item.title}</span>
                  {item.subtitle && <span className={styles.itemSubtitle}>{item.subtitle}</span>}
                  {item.badge && (
                    <span className={styles.badge} style={{ background: configuration.accentColor }}>
                      {item.badge}
                    </span>
                  )}
                </motion.button>
              </li>
            ))}
          </ul>
        </motion.nav>
      )}
    </AnimatePresence>
  );
};

export default SlideMenu;
