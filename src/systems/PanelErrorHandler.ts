/**
 * Panel Error Handler
 *
 * Records inputs the panel layer refused, notifies subscribers and
 * publishes them on the event bus. Nothing here throws: the caller
 * has already left its state unchanged or fallen back.
 */

import { PanelEventBus, type PanelEventBusImpl } from './PanelEventBus';
import { createPanelEvent } from '../types/events';
import type { Unsubscribe } from '../types/contracts';

// ============================================================================
// Types
// ============================================================================

/**
 * Error severity levels
 */
export type PanelErrorSeverity = 'info' | 'warning' | 'error';

/**
 * Error categories
 */
export type PanelErrorCategory =
  | 'input'       // Values that cannot be interpreted
  | 'gesture'     // Gesture events out of order
  | 'lifecycle'   // Use after dispose
  | 'unknown';

/**
 * Known error codes
 */
export type PanelErrorCode =
  | 'INVALID_EXTENT'
  | 'INVALID_VELOCITY'
  | 'DRAG_NOT_ACTIVE'
  | 'CONTROLLER_DISPOSED'
  | 'UNKNOWN_DETENT';

/**
 * Structured panel error
 */
export interface PanelError {
  id: string;
  code: PanelErrorCode;
  message: string;
  severity: PanelErrorSeverity;
  category: PanelErrorCategory;
  panelId: string;
  timestamp: number;
  context?: Record<string, unknown>;
}

/**
 * Error subscriber
 */
export type PanelErrorListener = (error: PanelError) => void;

/**
 * Options accepted by handle()
 */
export interface HandleOptions {
  panelId?: string;
  severity?: PanelErrorSeverity;
  context?: Record<string, unknown>;
}

/**
 * Error handler configuration
 */
interface ErrorHandlerConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Bus to publish panel:error on */
  eventBus?: PanelEventBusImpl;
  /** Most recent errors kept in memory */
  maxActiveErrors?: number;
}

// ============================================================================
// Constants
// ============================================================================

const CATEGORY_BY_CODE: Record<PanelErrorCode, PanelErrorCategory> = {
  INVALID_EXTENT: 'input',
  INVALID_VELOCITY: 'input',
  UNKNOWN_DETENT: 'input',
  DRAG_NOT_ACTIVE: 'gesture',
  CONTROLLER_DISPOSED: 'lifecycle',
};

const SEVERITY_BY_CATEGORY: Record<PanelErrorCategory, PanelErrorSeverity> = {
  input: 'warning',
  gesture: 'info',
  lifecycle: 'error',
  unknown: 'error',
};

// ============================================================================
// PanelErrorHandler
// ============================================================================

export class PanelErrorHandlerImpl {
  private config: Required<ErrorHandlerConfig>;
  private listeners: Set<PanelErrorListener> = new Set();
  private activeErrors: Map<string, PanelError> = new Map();
  private sequence = 0;

  constructor(config: ErrorHandlerConfig = {}) {
    this.config = {
      debug: config.debug ?? process.env.NODE_ENV === 'development',
      eventBus: config.eventBus ?? PanelEventBus,
      maxActiveErrors: config.maxActiveErrors ?? 50,
    };
  }

  /**
   * Record a rejected input
   */
  handle(code: PanelErrorCode, message: string, options: HandleOptions = {}): PanelError {
    const category = CATEGORY_BY_CODE[code] ?? 'unknown';
    const error: PanelError = {
      id: `err_${Date.now()}_${++this.sequence}`,
      code,
      message,
      severity: options.severity ?? SEVERITY_BY_CATEGORY[category],
      category,
      panelId: options.panelId ?? 'unknown',
      timestamp: Date.now(),
      context: options.context,
    };

    this.activeErrors.set(error.id, error);
    this.trimActiveErrors();

    if (this.config.debug) {
      console.warn(`[PanelErrorHandler] ${error.code}:`, error.message, error.context);
    }

    for (const listener of [...this.listeners]) {
      try {
        listener(error);
      } catch (listenerError) {
        console.error('[PanelErrorHandler] Listener error:', listenerError);
      }
    }

    this.config.eventBus.emit(
      createPanelEvent(
        'panel:error',
        {
          errorId: error.id,
          errorCode: error.code,
          message: error.message,
          severity: error.severity,
        },
        error.panelId
      )
    );

    return error;
  }

  /**
   * Dismiss an error
   */
  dismiss(errorId: string): void {
    this.activeErrors.delete(errorId);
  }

  /**
   * Get active errors, oldest first
   */
  getActiveErrors(): PanelError[] {
    return Array.from(this.activeErrors.values());
  }

  /**
   * Get active errors for one panel
   */
  getErrorsFor(panelId: string): PanelError[] {
    return this.getActiveErrors().filter((error) => error.panelId === panelId);
  }

  /**
   * Subscribe to errors
   */
  subscribe(listener: PanelErrorListener): Unsubscribe {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Drop all errors and listeners
   */
  reset(): void {
    this.activeErrors.clear();
    this.listeners.clear();
  }

  private trimActiveErrors(): void {
    while (this.activeErrors.size > this.config.maxActiveErrors) {
      const oldest = this.activeErrors.keys().next();
      if (oldest.done) return;
      this.activeErrors.delete(oldest.value);
    }
  }
}

/**
 * Shared error handler instance
 */
export const PanelErrorHandler = new PanelErrorHandlerImpl();

/**
 * Create a new error handler (for testing or isolation)
 */
export function createPanelErrorHandler(config?: ErrorHandlerConfig): PanelErrorHandlerImpl {
  return new PanelErrorHandlerImpl(config);
}

export type { ErrorHandlerConfig };
