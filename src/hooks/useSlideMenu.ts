/**
 * useSlideMenu Hook
 */

import { useEffect, useRef, useState } from 'react';
import { useStore } from 'zustand';
import {
  SlideMenuController,
  type SlideMenuControllerOptions,
  type SlideMenuState,
} from '../systems/SlideMenuController';
import type { MenuItem } from '../types/menu';

export interface UseSlideMenuResult {
  menu: SlideMenuController;
  state: SlideMenuState;
}

/**
 * Own a SlideMenuController and follow its state.
 * `items` is kept in sync (compared item by item); other options are
 * read once.
 */
export function useSlideMenu(options: SlideMenuControllerOptions = {}): UseSlideMenuResult {
  const optionsRef = useRef(options);
  optionsRef.current = options;

  const [menu, setMenu] = useState(() => new SlideMenuController(options));

  useEffect(() => {
    if (menu.isDisposed) {
      setMenu(new SlideMenuController(optionsRef.current));
      return;
    }
    return () => menu.dispose();
  }, [menu]);

  const items: MenuItem[] | undefined = options.items;
  useEffect(() => {
    if (items && !sameItems(menu.getState().items, items)) {
      menu.setItems(items);
    }
  }, [menu, items]);

  const state = useStore(menu.store);

  return { menu, state };
}

function sameItems(a: MenuItem[], b: MenuItem[]): boolean {
  return a.length === b.length && a.every((item, index) => item === b[index]);
}

export default useSlideMenu;
