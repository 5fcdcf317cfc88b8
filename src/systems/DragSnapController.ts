/**
 * Drag Snap Controller
 *
 * Turns a continuous drag (offset deltas plus an end velocity) into a
 * discrete detent transition. A fast flick moves exactly one detent in
 * its direction; a slow release settles on the detent nearest to the
 * velocity-projected rest extent.
 *
 * States: settled(detent) and dragging(detent, offset). The controller
 * is synchronous and holds no timers.
 */

import { DetentSet } from './DetentSet';
import { PanelEventBus, type PanelEventBusImpl } from './PanelEventBus';
import { PanelErrorHandler, type PanelErrorHandlerImpl } from './PanelErrorHandler';
import {
  createPanelStore,
  registerPanelStore,
  unregisterPanelStore,
  type PanelPhase,
  type PanelStore,
  type PanelStoreState,
} from '../stores/panelStore';
import {
  Detents,
  getDetentId,
  isSameDetent,
  resolveDetentExtent,
  type Detent,
} from '../types/detent';
import { clamp, generateId, sanitizeExtent, PANEL_TIMING } from '../types/common';
import type { DragGestureSink, Disposable, PanelEventSource, Unsubscribe } from '../types/contracts';
import { createPanelEvent } from '../types/events';

// ============================================================================
// Types
// ============================================================================

/**
 * Controller options
 */
export interface DragSnapControllerOptions {
  /** Candidate rest positions (empty falls back to medium + large) */
  detents?: DetentSet | Iterable<Detent>;
  /** Starting detent */
  initialDetent?: Detent;
  /** |velocity| above which a release snaps one step in its direction */
  velocityThreshold?: number;
  /** Weight of the end velocity in the projected rest extent */
  velocityDampingFactor?: number;
  /** Initial container extent */
  containerExtent?: number;
  /** Identifier used in events, logs and the store registry */
  panelId?: string;
  /** Enable debug logging */
  debug?: boolean;
  /** Connect the store to Redux devtools */
  devtools?: boolean;
  /** Register the store on construction; otherwise call `registerStore()` */
  registerStore?: boolean;
  /** Bus for panel events */
  eventBus?: PanelEventBusImpl;
  /** Sink for rejected inputs */
  errorHandler?: PanelErrorHandlerImpl;
}

/**
 * Which rule produced a snap
 */
export type SnapRule = 'velocity' | 'nearest';

/**
 * Outcome of the snap decision
 */
export interface SnapDecision {
  detent: Detent;
  rule: SnapRule;
  projectedExtent: number;
}

// ============================================================================
// Pure helpers
// ============================================================================

/**
 * Extent the panel would come to rest at if released now
 */
export function projectRestExtent(
  detent: Detent,
  containerExtent: number,
  offset: number,
  velocity: number,
  dampingFactor: number = PANEL_TIMING.velocityDampingFactor
): number {
  return resolveDetentExtent(detent, containerExtent) - offset - velocity * dampingFactor;
}

/**
 * Two-phase snap policy: velocity override, then nearest detent
 */
export function decideSnap(
  detents: DetentSet,
  current: Detent,
  containerExtent: number,
  offset: number,
  velocity: number,
  velocityThreshold: number = PANEL_TIMING.velocityThreshold,
  dampingFactor: number = PANEL_TIMING.velocityDampingFactor
): SnapDecision {
  const projectedExtent = projectRestExtent(current, containerExtent, offset, velocity, dampingFactor);

  if (Math.abs(velocity) > velocityThreshold) {
    // Negative velocity moves toward a larger extent
    const detent = velocity < 0 ? detents.next(current) : detents.previous(current);
    return { detent, rule: 'velocity', projectedExtent };
  }

  return {
    detent: detents.nearest(projectedExtent, containerExtent),
    rule: 'nearest',
    projectedExtent,
  };
}

/**
 * Extent to render: the live extent bounded by half the smallest detent
 * and 95% of the container. Display only; the drag offset stays raw.
 */
export function computeDisplayExtent(
  detents: DetentSet,
  current: Detent,
  offset: number,
  containerExtent: number
): number {
  const container = sanitizeExtent(containerExtent);
  const minExtent = resolveDetentExtent(detents.smallest, container) * 0.5;
  const maxExtent = container * 0.95;
  return clamp(resolveDetentExtent(current, container) - offset, minExtent, maxExtent);
}

// ============================================================================
// DragSnapController
// ============================================================================

export class DragSnapController implements DragGestureSink, Disposable {
  readonly detents: DetentSet;
  readonly store: PanelStore;
  readonly panelId: string;
  readonly velocityThreshold: number;
  readonly velocityDampingFactor: number;

  private readonly debug: boolean;
  private readonly eventBus: PanelEventBusImpl;
  private readonly errorHandler: PanelErrorHandlerImpl;
  private disposed = false;

  constructor(options: DragSnapControllerOptions = {}) {
    this.detents =
      options.detents instanceof DetentSet
        ? options.detents
        : new DetentSet(options.detents ?? []);
    this.panelId = options.panelId ?? generateId('sheet');
    this.velocityThreshold = nonNegativeOr(
      options.velocityThreshold,
      PANEL_TIMING.velocityThreshold
    );
    this.velocityDampingFactor = nonNegativeOr(
      options.velocityDampingFactor,
      PANEL_TIMING.velocityDampingFactor
    );
    this.debug = options.debug ?? process.env.NODE_ENV === 'development';
    this.eventBus = options.eventBus ?? PanelEventBus;
    this.errorHandler = options.errorHandler ?? PanelErrorHandler;

    const containerExtent = sanitizeExtent(options.containerExtent ?? 0);
    const currentDetent = this.pickInitialDetent(options.initialDetent);

    this.store = createPanelStore({
      name: this.panelId,
      devtools: options.devtools,
      register: options.registerStore,
      initialState: {
        currentDetent,
        liveDragOffset: 0,
        containerExtent,
        phase: 'settled',
        displayExtent: computeDisplayExtent(this.detents, currentDetent, 0, containerExtent),
      },
    });

    this.log(`Created with ${this.detents.size} detents, initial "${getDetentId(currentDetent)}"`);
  }

  // ==========================================================================
  // State
  // ==========================================================================

  getState(): PanelStoreState {
    return this.store.getState();
  }

  get currentDetent(): Detent {
    return this.store.getState().currentDetent;
  }

  get liveDragOffset(): number {
    return this.store.getState().liveDragOffset;
  }

  get containerExtent(): number {
    return this.store.getState().containerExtent;
  }

  get phase(): PanelPhase {
    return this.store.getState().phase;
  }

  get displayExtent(): number {
    return this.store.getState().displayExtent;
  }

  get isDragging(): boolean {
    return this.phase === 'dragging';
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  /**
   * Resolved extent of the settled detent
   */
  get currentExtent(): number {
    return resolveDetentExtent(this.currentDetent, this.containerExtent);
  }

  /**
   * Listen for settled detent changes
   */
  onDetentChange(listener: (detent: Detent, previous: Detent) => void): Unsubscribe {
    return this.store.subscribe((state) => state.currentDetent, listener, {
      equalityFn: isSameDetent,
    });
  }

  /**
   * Listen for any state change
   */
  subscribe(listener: (state: PanelStoreState, previous: PanelStoreState) => void): Unsubscribe {
    return this.store.subscribe(listener);
  }

  // ==========================================================================
  // Gesture input
  // ==========================================================================

  /**
   * Settled(d) -> Dragging(d, 0). A second call restarts the offset.
   */
  beginDrag(): void {
    if (this.rejectIfDisposed('beginDrag')) return;

    if (this.isDragging) {
      this.log('beginDrag while dragging, restarting offset');
    }

    this.update({ phase: 'dragging', liveDragOffset: 0 });

    this.eventBus.emit(
      createPanelEvent(
        'panel:drag_start',
        { detentId: getDetentId(this.currentDetent), containerExtent: this.containerExtent },
        this.panelId,
        'gesture'
      )
    );
  }

  /**
   * Dragging(d, o) -> Dragging(d, o + delta). Not clamped.
   * Positive deltas move toward a smaller extent.
   */
  dragUpdate(deltaExtent: number): void {
    if (this.rejectIfDisposed('dragUpdate')) return;

    if (!this.isDragging) {
      this.errorHandler.handle('DRAG_NOT_ACTIVE', 'dragUpdate received without beginDrag', {
        panelId: this.panelId,
        context: { deltaExtent },
      });
      return;
    }

    if (!Number.isFinite(deltaExtent)) {
      this.errorHandler.handle('INVALID_EXTENT', 'Drag delta must be a finite number', {
        panelId: this.panelId,
        context: { deltaExtent },
      });
      return;
    }

    this.update({ liveDragOffset: this.liveDragOffset + deltaExtent });
  }

  /**
   * Dragging(d, o) -> Settled(d'). Returns the settled detent.
   */
  dragEnd(velocity: number): Detent {
    if (this.rejectIfDisposed('dragEnd')) return this.currentDetent;

    if (!this.isDragging) {
      this.errorHandler.handle('DRAG_NOT_ACTIVE', 'dragEnd received without beginDrag', {
        panelId: this.panelId,
        context: { velocity },
      });
      return this.currentDetent;
    }

    if (!Number.isFinite(velocity)) {
      this.errorHandler.handle('INVALID_VELOCITY', 'Release velocity must be a finite number', {
        panelId: this.panelId,
        context: { velocity },
      });
      this.cancelDrag();
      return this.currentDetent;
    }

    const from = this.currentDetent;
    const offset = this.liveDragOffset;
    const decision = this.resolveSnap(offset, velocity);

    this.log(
      `dragEnd offset=${offset} velocity=${velocity} -> "${getDetentId(decision.detent)}" (${decision.rule})`
    );

    this.settle(decision.detent, 'gesture');

    this.eventBus.emit(
      createPanelEvent(
        'panel:drag_end',
        {
          fromDetentId: getDetentId(from),
          toDetentId: getDetentId(decision.detent),
          offset,
          velocity,
          projectedExtent: decision.projectedExtent,
          decision: decision.rule,
        },
        this.panelId,
        'gesture'
      )
    );

    return decision.detent;
  }

  /**
   * Dragging(d, o) -> Settled(d). For gestures the host abandons.
   */
  cancelDrag(): void {
    if (this.rejectIfDisposed('cancelDrag')) return;
    if (!this.isDragging) return;

    const offset = this.liveDragOffset;
    this.update({ phase: 'settled', liveDragOffset: 0 });

    this.eventBus.emit(
      createPanelEvent(
        'panel:drag_cancel',
        { detentId: getDetentId(this.currentDetent), offset },
        this.panelId,
        'gesture'
      )
    );
  }

  // ==========================================================================
  // Host input
  // ==========================================================================

  /**
   * Host layout changed
   */
  setContainerExtent(extent: number): void {
    if (this.rejectIfDisposed('setContainerExtent')) return;

    if (!Number.isFinite(extent)) {
      this.errorHandler.handle('INVALID_EXTENT', 'Container extent must be a finite number', {
        panelId: this.panelId,
        context: { extent },
      });
      return;
    }

    this.update({ containerExtent: sanitizeExtent(extent) });
  }

  // ==========================================================================
  // Programmatic navigation
  // ==========================================================================

  expandToNext(): Detent {
    return this.navigate('expandToNext', (current) => this.detents.next(current));
  }

  collapseToPrevious(): Detent {
    return this.navigate('collapseToPrevious', (current) => this.detents.previous(current));
  }

  cycleToNext(): Detent {
    return this.navigate('cycleToNext', (current) => this.detents.cycleNext(current));
  }

  /**
   * Settle on a detent. Non-members settle on the nearest member.
   */
  jumpTo(detent: Detent): Detent {
    return this.navigate('jumpTo', () => {
      if (this.detents.contains(detent)) {
        return detent;
      }

      const container = this.containerExtent;
      const member =
        container > 0
          ? this.detents.nearest(resolveDetentExtent(detent, container), container)
          : this.detents.resolveMember(detent);

      this.errorHandler.handle(
        'UNKNOWN_DETENT',
        `Detent "${getDetentId(detent)}" is not in the set, using "${getDetentId(member)}"`,
        { panelId: this.panelId, severity: 'info' }
      );
      return member;
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  /**
   * Projected rest extent for a release at `velocity` right now
   */
  projectExtent(velocity: number): number {
    return projectRestExtent(
      this.currentDetent,
      this.containerExtent,
      this.liveDragOffset,
      velocity,
      this.velocityDampingFactor
    );
  }

  /**
   * Snap decision for an offset/velocity pair, without applying it
   */
  resolveSnap(offset: number, velocity: number): SnapDecision {
    return decideSnap(
      this.detents,
      this.currentDetent,
      this.containerExtent,
      offset,
      velocity,
      this.velocityThreshold,
      this.velocityDampingFactor
    );
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Add the store to the panel registry
   */
  registerStore(): void {
    if (this.disposed) return;
    registerPanelStore(this.panelId, this.store);
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    unregisterPanelStore(this.panelId, this.store);
    this.log('Disposed');
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private pickInitialDetent(initial: Detent | undefined): Detent {
    if (initial && this.detents.contains(initial)) {
      return initial;
    }
    if (this.detents.contains(Detents.medium)) {
      return Detents.medium;
    }
    return this.detents.resolveMember(initial ?? Detents.medium);
  }

  private navigate(command: string, pick: (current: Detent) => Detent): Detent {
    if (this.rejectIfDisposed(command)) return this.currentDetent;

    const target = pick(this.currentDetent);
    this.log(`${command} -> "${getDetentId(target)}"`);
    this.settle(target, 'command');
    return target;
  }

  private settle(detent: Detent, source: PanelEventSource): void {
    const from = this.currentDetent;

    this.update({ currentDetent: detent, liveDragOffset: 0, phase: 'settled' });

    if (!isSameDetent(from, detent)) {
      this.eventBus.emit(
        createPanelEvent(
          'panel:detent_change',
          {
            fromDetentId: getDetentId(from),
            toDetentId: getDetentId(detent),
            extent: resolveDetentExtent(detent, this.containerExtent),
          },
          this.panelId,
          source
        )
      );
    }
  }

  private update(changes: Partial<Omit<PanelStoreState, 'displayExtent'>>): void {
    const next = { ...this.store.getState(), ...changes };
    this.store.setState({
      ...changes,
      displayExtent: computeDisplayExtent(
        this.detents,
        next.currentDetent,
        next.liveDragOffset,
        next.containerExtent
      ),
    });
  }

  private rejectIfDisposed(command: string): boolean {
    if (!this.disposed) return false;

    this.errorHandler.handle('CONTROLLER_DISPOSED', `${command} called after dispose`, {
      panelId: this.panelId,
    });
    return true;
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[DragSnapController:${this.panelId}] ${message}`);
    }
  }
}

function nonNegativeOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) && value >= 0 ? value : fallback;
}
