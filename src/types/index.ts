/**
 * Panel Types
 */

// Common
export {
  clamp,
  sanitizeExtent,
  springTransition,
  generateId,
  PANEL_TIMING,
  INSTANT_TRANSITION,
  SHADOWS,
  type Point2D,
  type Size2D,
  type SpringSpec,
  type PanelTransition,
  type BackgroundStyle,
  type ShadowSpec,
} from './common';

// Detents
export {
  Detents,
  DETENT_REFERENCE_EXTENT,
  DETENT_RULES,
  resolveDetentExtent,
  getDetentId,
  isSameDetent,
  describeDetent,
  compareDetents,
  type Detent,
  type DetentKind,
} from './detent';

// Contracts
export type {
  PanelEventType,
  PanelEventSource,
  PanelEvent,
  PanelEventHandler,
  Unsubscribe,
  DragGestureSink,
  Disposable,
} from './contracts';

// Events
export {
  createPanelEvent,
  isEventType,
  type DragStartPayload,
  type DragEndPayload,
  type DragCancelPayload,
  type DetentChangePayload,
  type PresentedPayload,
  type DismissedPayload,
  type PanelErrorPayload,
  type MenuPresentedPayload,
  type MenuDismissedPayload,
  type MenuActionPayload,
  type PanelEventPayloadMap,
} from './events';

// Sheet configuration
export {
  DEFAULT_SHEET_CONFIGURATION,
  SheetPresets,
  resolveSheetConfiguration,
  type SheetConfigurationInput,
  type SheetConfiguration,
  type SheetPresetName,
} from './sheet';

// Menu configuration
export {
  DEFAULT_MENU_CONFIGURATION,
  MenuPresets,
  resolveMenuConfiguration,
  isVerticalDrag,
  type MenuPresentationStyle,
  type MenuItem,
  type MenuConfigurationInput,
  type MenuConfiguration,
} from './menu';
