/**
 * Panel Systems
 */

// Event Bus
export {
  PanelEventBus,
  createPanelEventBus,
  type PanelEventBusImpl,
  type EventBusConfig,
  type EventHistoryEntry,
  type TypedPanelEventHandler,
} from './PanelEventBus';

// Error Handler
export {
  PanelErrorHandler,
  PanelErrorHandlerImpl,
  createPanelErrorHandler,
  type ErrorHandlerConfig,
  type PanelError,
  type PanelErrorCode,
  type PanelErrorCategory,
  type PanelErrorSeverity,
  type PanelErrorListener,
  type HandleOptions,
} from './PanelErrorHandler';

// Detent set
export { DetentSet, FALLBACK_DETENTS } from './DetentSet';

// Drag / snap controller
export {
  DragSnapController,
  projectRestExtent,
  decideSnap,
  computeDisplayExtent,
  type DragSnapControllerOptions,
  type SnapRule,
  type SnapDecision,
} from './DragSnapController';

// Sheet presenter
export {
  SheetPresenter,
  buildSheetFrame,
  type SheetPresentation,
  type SheetPresentationState,
  type SheetPresentationStore,
  type SheetPresenterOptions,
  type SheetFrame,
  type AdjustDirection,
} from './SheetPresenter';

// Slide menu
export {
  SlideMenuController,
  type SlideMenuState,
  type SlideMenuStore,
  type SlideMenuControllerOptions,
} from './SlideMenuController';

// Velocity
export { VelocityTracker } from './VelocityTracker';
