/**
 * Sheet Presenter
 *
 * Thin layer between a host UI and a DragSnapController. It reads the
 * controller's state to produce a render frame, forwards gestures into
 * the controller (subject to the sheet configuration) and owns the
 * presented/dismissed state of modal sheets.
 *
 * The controller never references the presenter.
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';
import { DragSnapController, type DragSnapControllerOptions } from './DragSnapController';
import { PanelEventBus, type PanelEventBusImpl } from './PanelEventBus';
import {
  resolveSheetConfiguration,
  type SheetConfiguration,
  type SheetConfigurationInput,
} from '../types/sheet';
import { describeDetent, getDetentId, isSameDetent, resolveDetentExtent, type Detent } from '../types/detent';
import { INSTANT_TRANSITION, type PanelTransition } from '../types/common';
import type { Disposable, DragGestureSink, Unsubscribe } from '../types/contracts';
import { createPanelEvent, type DismissedPayload } from '../types/events';
import type { PanelPhase, PanelStoreState } from '../stores/panelStore';

// ============================================================================
// Types
// ============================================================================

/**
 * Modal sheets can be dismissed; persistent sheets are always on screen
 */
export type SheetPresentation = 'modal' | 'persistent';

/**
 * Accessibility adjust direction
 */
export type AdjustDirection = 'increment' | 'decrement';

/**
 * Presenter-owned state
 */
export interface SheetPresentationState {
  isPresented: boolean;
  reduceMotion: boolean;
}

/**
 * Everything a renderer needs for one frame
 */
export interface SheetFrame {
  isPresented: boolean;
  phase: PanelPhase;
  currentDetent: Detent;
  /** ARIA value text for the current detent */
  detentDescription: string;
  displayExtent: number;
  containerExtent: number;
  backdropOpacity: number;
  showHandle: boolean;
  cornerRadius: number;
  transition: PanelTransition;
}

/**
 * Presenter options
 */
export interface SheetPresenterOptions
  extends Omit<DragSnapControllerOptions, 'velocityThreshold' | 'velocityDampingFactor'> {
  /** Sheet configuration (defaults filled in) */
  configuration?: SheetConfigurationInput;
  /** Modal (default) or persistent */
  presentation?: SheetPresentation;
  /** Initial presented state; persistent sheets are always presented */
  isPresented?: boolean;
  /** Make frame transitions instant */
  reduceMotion?: boolean;
  /** Called after the sheet is dismissed */
  onDismiss?: (reason: DismissedPayload['reason']) => void;
  /** Drive an existing controller instead of creating one */
  controller?: DragSnapController;
}

function buildPresentationStore(initial: SheetPresentationState) {
  return createStore<SheetPresentationState>()(subscribeWithSelector(() => ({ ...initial })));
}

export type SheetPresentationStore = ReturnType<typeof buildPresentationStore>;

// ============================================================================
// SheetPresenter
// ============================================================================

export class SheetPresenter implements DragGestureSink, Disposable {
  readonly controller: DragSnapController;
  readonly configuration: SheetConfiguration;
  readonly presentation: SheetPresentation;
  readonly presentationStore: SheetPresentationStore;

  private readonly ownsController: boolean;
  private readonly eventBus: PanelEventBusImpl;
  private readonly debug: boolean;
  private onDismiss: SheetPresenterOptions['onDismiss'];
  private disposed = false;

  constructor(options: SheetPresenterOptions = {}) {
    const { configuration, presentation, isPresented, reduceMotion, onDismiss, controller, ...controllerOptions } =
      options;

    this.configuration = resolveSheetConfiguration(configuration);
    this.presentation = presentation ?? 'modal';
    this.eventBus = options.eventBus ?? PanelEventBus;
    this.debug = options.debug ?? process.env.NODE_ENV === 'development';
    this.onDismiss = onDismiss;

    this.ownsController = controller === undefined;
    this.controller =
      controller ??
      new DragSnapController({
        ...controllerOptions,
        velocityThreshold: this.configuration.velocityThreshold,
        velocityDampingFactor: this.configuration.velocityDampingFactor,
      });

    this.presentationStore = buildPresentationStore({
      isPresented: this.presentation === 'persistent' ? true : isPresented ?? false,
      reduceMotion: reduceMotion ?? false,
    });
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get panelId(): string {
    return this.controller.panelId;
  }

  get isPresented(): boolean {
    return this.presentationStore.getState().isPresented;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Whether drag input reaches the controller
   */
  get acceptsGestures(): boolean {
    return this.isPresented && !this.configuration.isInteractiveDismissDisabled;
  }

  get displayExtent(): number {
    return this.controller.displayExtent;
  }

  /**
   * Frame for the current state
   */
  getFrame(): SheetFrame {
    return buildSheetFrame(
      this.controller.getState(),
      this.presentationStore.getState(),
      this.configuration
    );
  }

  /**
   * Listen for changes to either the controller or the presentation
   */
  subscribe(listener: (frame: SheetFrame) => void): Unsubscribe {
    const notify = () => listener(this.getFrame());
    const unsubscribeController = this.controller.subscribe(notify);
    const unsubscribePresentation = this.presentationStore.subscribe(notify);

    return () => {
      unsubscribeController();
      unsubscribePresentation();
    };
  }

  setOnDismiss(onDismiss: SheetPresenterOptions['onDismiss']): void {
    this.onDismiss = onDismiss;
  }

  setReduceMotion(reduceMotion: boolean): void {
    this.presentationStore.setState({ reduceMotion });
  }

  setContainerExtent(extent: number): void {
    this.controller.setContainerExtent(extent);
  }

  // ==========================================================================
  // Presentation
  // ==========================================================================

  present(): void {
    if (this.disposed || this.isPresented) return;

    this.presentationStore.setState({ isPresented: true });
    this.log('Presented');
    this.eventBus.emit(
      createPanelEvent(
        'panel:presented',
        { detentId: getDetentId(this.controller.currentDetent) },
        this.panelId,
        'command'
      )
    );
  }

  /**
   * Hide a modal sheet. Persistent sheets ignore this.
   */
  dismiss(reason: DismissedPayload['reason'] = 'command'): boolean {
    if (this.disposed || !this.isPresented) return false;
    if (this.presentation === 'persistent') {
      this.log(`Ignored dismiss (${reason}) on persistent sheet`);
      return false;
    }

    this.controller.cancelDrag();
    this.presentationStore.setState({ isPresented: false });
    this.log(`Dismissed (${reason})`);

    this.eventBus.emit(createPanelEvent('panel:dismissed', { reason }, this.panelId, 'command'));

    try {
      this.onDismiss?.(reason);
    } catch (error) {
      console.error(`[SheetPresenter:${this.panelId}] onDismiss failed:`, error);
    }
    return true;
  }

  // ==========================================================================
  // Gestures
  // ==========================================================================

  beginDrag(): void {
    if (!this.acceptsGestures) return;
    this.controller.beginDrag();
  }

  dragUpdate(deltaExtent: number): void {
    if (!this.acceptsGestures) return;
    this.controller.dragUpdate(deltaExtent);
  }

  /**
   * Release. A modal, dismissable sheet dismisses instead of settling when
   * the release projects below half the smallest detent, or when it is
   * flicked down from the smallest detent.
   */
  dragEnd(velocity: number): void {
    if (!this.acceptsGestures) return;

    if (this.controller.isDragging && Number.isFinite(velocity) && this.shouldDismissOnRelease(velocity)) {
      this.dismiss('drag');
      return;
    }

    this.controller.dragEnd(velocity);
  }

  cancelDrag(): void {
    this.controller.cancelDrag();
  }

  /**
   * Handle tap: cycle through detents
   */
  tapHandle(): void {
    if (!this.isPresented || !this.configuration.showHandle || !this.configuration.tapHandleToCycle) {
      return;
    }
    this.controller.cycleToNext();
  }

  /**
   * Backdrop tap
   */
  tapBackdrop(): void {
    const { tapBackgroundToDismiss, isDismissable, dimBackground } = this.configuration;
    if (tapBackgroundToDismiss && isDismissable && dimBackground) {
      this.dismiss('backdrop');
    }
  }

  /**
   * Assistive-technology adjust action
   */
  adjust(direction: AdjustDirection): void {
    if (!this.isPresented) return;

    if (direction === 'increment') {
      this.controller.expandToNext();
    } else {
      this.controller.collapseToPrevious();
    }
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    if (this.ownsController) {
      this.controller.dispose();
    }
  }

  private shouldDismissOnRelease(velocity: number): boolean {
    if (this.presentation !== 'modal' || !this.configuration.isDismissable) {
      return false;
    }

    const { detents, containerExtent, velocityThreshold } = this.controller;
    const smallest = detents.smallest;

    if (Math.abs(velocity) > velocityThreshold) {
      return velocity > 0 && isSameDetent(this.controller.currentDetent, smallest);
    }

    const dismissLine = resolveDetentExtent(smallest, containerExtent) * 0.5;
    return this.controller.projectExtent(velocity) < dismissLine;
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[SheetPresenter:${this.panelId}] ${message}`);
    }
  }
}

// ============================================================================
// Frame
// ============================================================================

/**
 * Combine controller and presentation state into a render frame
 */
export function buildSheetFrame(
  panel: PanelStoreState,
  presentation: SheetPresentationState,
  configuration: SheetConfiguration
): SheetFrame {
  const backdropOpacity =
    presentation.isPresented && configuration.dimBackground ? configuration.dimOpacity : 0;

  return {
    isPresented: presentation.isPresented,
    phase: panel.phase,
    currentDetent: panel.currentDetent,
    detentDescription: describeDetent(panel.currentDetent),
    displayExtent: panel.displayExtent,
    containerExtent: panel.containerExtent,
    backdropOpacity,
    showHandle: configuration.showHandle,
    cornerRadius: configuration.cornerRadius,
    // The live drag follows the finger; only settling animates
    transition:
      presentation.reduceMotion || panel.phase === 'dragging'
        ? INSTANT_TRANSITION
        : configuration.transition,
  };
}
