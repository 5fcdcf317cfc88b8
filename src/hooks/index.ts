/**
 * Panel Hooks
 */

// Sheet presenter
export { useSheetPresenter, type UseSheetPresenterResult } from './useSheetPresenter';

// Sheet gesture
export {
  useSheetGesture,
  type SheetGestureOptions,
  type SheetGestureHandlers,
  type GesturePointerEvent,
} from './useSheetGesture';

// Slide menu
export { useSlideMenu, type UseSlideMenuResult } from './useSlideMenu';
