/**
 * Slide Menu Controller
 *
 * Presentation state for a slide-in menu: present/dismiss, a drag that
 * only follows the dismissal direction, and a release that either
 * dismisses past the threshold or snaps back.
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import { PanelEventBus, type PanelEventBusImpl } from './PanelEventBus';
import { PanelErrorHandler, type PanelErrorHandlerImpl } from './PanelErrorHandler';
import {
  resolveMenuConfiguration,
  type MenuConfiguration,
  type MenuConfigurationInput,
  type MenuItem,
} from '../types/menu';
import { clamp, generateId } from '../types/common';
import type { Disposable, Unsubscribe } from '../types/contracts';
import { createPanelEvent, type MenuDismissedPayload } from '../types/events';

/**
 * Observable menu state
 */
export interface SlideMenuState {
  isPresented: boolean;
  /** Distance dragged toward dismissal (never negative) */
  dragOffset: number;
  /** 0..1 */
  backdropOpacity: number;
  items: MenuItem[];
}

/**
 * Controller options
 */
export interface SlideMenuControllerOptions {
  items?: MenuItem[];
  configuration?: MenuConfigurationInput;
  menuId?: string;
  debug?: boolean;
  eventBus?: PanelEventBusImpl;
  errorHandler?: PanelErrorHandlerImpl;
}

const INITIAL_MENU_STATE: SlideMenuState = {
  isPresented: false,
  dragOffset: 0,
  backdropOpacity: 0,
  items: [],
};

function buildMenuStore(items: MenuItem[]) {
  return createStore<SlideMenuState>()(
    subscribeWithSelector(() => ({ ...INITIAL_MENU_STATE, items }))
  );
}

export type SlideMenuStore = ReturnType<typeof buildMenuStore>;

export class SlideMenuController implements Disposable {
  readonly menuId: string;
  readonly store: SlideMenuStore;
  readonly configuration: MenuConfiguration;

  private readonly debug: boolean;
  private readonly eventBus: PanelEventBusImpl;
  private readonly errorHandler: PanelErrorHandlerImpl;
  private pendingAction: ReturnType<typeof setTimeout> | null = null;
  private disposed = false;

  constructor(options: SlideMenuControllerOptions = {}) {
    this.menuId = options.menuId ?? generateId('menu');
    this.configuration = resolveMenuConfiguration(options.configuration);
    this.debug = options.debug ?? process.env.NODE_ENV === 'development';
    this.eventBus = options.eventBus ?? PanelEventBus;
    this.errorHandler = options.errorHandler ?? PanelErrorHandler;
    this.store = buildMenuStore(options.items ?? []);
  }

  getState(): SlideMenuState {
    return this.store.getState();
  }

  get isPresented(): boolean {
    return this.store.getState().isPresented;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  subscribe(listener: (state: SlideMenuState, previous: SlideMenuState) => void): Unsubscribe {
    return this.store.subscribe(listener);
  }

  setItems(items: MenuItem[]): void {
    this.store.setState({ items });
  }

  present(): void {
    if (this.rejectIfDisposed('present') || this.isPresented) return;

    this.store.setState({ isPresented: true, backdropOpacity: 1, dragOffset: 0 });
    this.log('Presented');
    this.eventBus.emit(
      createPanelEvent('menu:presented', { itemCount: this.getState().items.length }, this.menuId, 'command')
    );
  }

  dismiss(reason: MenuDismissedPayload['reason'] = 'command'): void {
    if (this.rejectIfDisposed('dismiss') || !this.isPresented) return;

    this.store.setState({ isPresented: false, backdropOpacity: 0, dragOffset: 0 });
    this.log(`Dismissed (${reason})`);
    this.eventBus.emit(createPanelEvent('menu:dismissed', { reason }, this.menuId, 'command'));
  }

  toggle(): void {
    if (this.isPresented) {
      this.dismiss();
    } else {
      this.present();
    }
  }

  /**
   * Backdrop tap
   */
  tapOutside(): void {
    if (this.configuration.dismissOnOutsideTap) {
      this.dismiss('outside');
    }
  }

  /**
   * Follow a drag toward dismissal; offsets in the other direction are ignored
   */
  updateDragOffset(offset: number): void {
    if (this.rejectIfDisposed('updateDragOffset')) return;
    if (!this.isPresented || !this.configuration.allowsDragToDismiss) return;
    if (!Number.isFinite(offset) || offset <= 0) return;

    const progress = clamp(offset / this.configuration.dragDismissalThreshold, 0, 1);
    this.store.setState({
      dragOffset: offset,
      backdropOpacity: 1 - progress * 0.5,
    });
  }

  /**
   * Release: dismiss at or past the threshold, otherwise snap back
   */
  endDrag(offset: number): void {
    if (this.rejectIfDisposed('endDrag')) return;
    if (!this.isPresented) return;

    if (
      this.configuration.allowsDragToDismiss &&
      Number.isFinite(offset) &&
      offset >= this.configuration.dragDismissalThreshold
    ) {
      this.dismiss('drag');
      return;
    }

    this.store.setState({ dragOffset: 0, backdropOpacity: 1 });
  }

  /**
   * Dismiss, then run the item's action once the dismissal has played
   */
  executeAction(item: MenuItem): void {
    if (this.rejectIfDisposed('executeAction')) return;

    this.dismiss('action');
    this.eventBus.emit(createPanelEvent('menu:action', { itemId: item.id }, this.menuId, 'command'));

    if (this.pendingAction !== null) {
      clearTimeout(this.pendingAction);
    }

    this.pendingAction = setTimeout(() => {
      this.pendingAction = null;
      try {
        item.action();
      } catch (error) {
        console.error(`[SlideMenuController:${this.menuId}] Action "${item.id}" failed:`, error);
      }
    }, this.configuration.actionDelayMs);
  }

  dispose(): void {
    if (this.disposed) return;
    if (this.pendingAction !== null) {
      clearTimeout(this.pendingAction);
      this.pendingAction = null;
    }
    this.disposed = true;
    this.log('Disposed');
  }

  private rejectIfDisposed(command: string): boolean {
    if (!this.disposed) return false;

    this.errorHandler.handle('CONTROLLER_DISPOSED', `${command} called after dispose`, {
      panelId: this.menuId,
    });
    return true;
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[SlideMenuController:${this.menuId}] ${message}`);
    }
  }
}
