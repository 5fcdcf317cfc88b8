/**
 * Sheet Components
 */

export { BottomSheet, type BottomSheetProps } from './BottomSheet';
export { SheetHandle, type SheetHandleProps } from './SheetHandle';
