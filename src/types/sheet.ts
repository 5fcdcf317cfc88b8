/**
 * Bottom Sheet Configuration
 *
 * Appearance and behavior of a detent-based bottom sheet.
 * All fields are optional on input; `resolveSheetConfiguration`
 * fills defaults and clamps ranges.
 */

import {
  clamp,
  springTransition,
  PANEL_TIMING,
  SHADOWS,
  type BackgroundStyle,
  type PanelTransition,
  type ShadowSpec,
} from './common';

/**
 * Sheet configuration (input)
 */
export interface SheetConfigurationInput {
  // Handle
  /** Show the grabber at the top of the sheet */
  showHandle?: boolean;
  handleColor?: string;
  handleWidth?: number;
  handleHeight?: number;

  // Behavior
  /** Backdrop taps and drags below the smallest detent may dismiss */
  isDismissable?: boolean;
  /** Ignore drag gestures entirely */
  isInteractiveDismissDisabled?: boolean;
  /** Tapping the handle cycles through detents */
  tapHandleToCycle?: boolean;
  /** |velocity| (units/s) above which a release snaps one step */
  velocityThreshold?: number;
  /** Weight of the release velocity in the projected rest extent */
  velocityDampingFactor?: number;

  // Backdrop
  dimBackground?: boolean;
  /** 0..1 */
  dimOpacity?: number;
  /** Needs isDismissable and dimBackground */
  tapBackgroundToDismiss?: boolean;

  // Surface
  accentColor?: string;
  backgroundStyle?: BackgroundStyle;
  cornerRadius?: number;
  shadow?: ShadowSpec;

  // Motion
  transition?: PanelTransition;
}

/**
 * Sheet configuration with every field present
 */
export type SheetConfiguration = Readonly<Required<SheetConfigurationInput>>;

/**
 * Default sheet configuration values
 */
export const DEFAULT_SHEET_CONFIGURATION: SheetConfiguration = Object.freeze<SheetConfiguration>({
  showHandle: true,
  handleColor: 'rgba(60, 60, 67, 0.5)',
  handleWidth: 36,
  handleHeight: 5,
  isDismissable: true,
  isInteractiveDismissDisabled: false,
  tapHandleToCycle: true,
  velocityThreshold: PANEL_TIMING.velocityThreshold,
  velocityDampingFactor: PANEL_TIMING.velocityDampingFactor,
  dimBackground: true,
  dimOpacity: 0.3,
  tapBackgroundToDismiss: true,
  accentColor: '#7A1E3A',
  backgroundStyle: { kind: 'liquidGlass' },
  cornerRadius: 20,
  shadow: SHADOWS.prominent,
  transition: springTransition({
    response: PANEL_TIMING.sheetResponse,
    dampingFraction: PANEL_TIMING.sheetDampingFraction,
  }),
});

/**
 * Merge input over defaults and clamp ranges
 */
export function resolveSheetConfiguration(
  input: SheetConfigurationInput = {},
  base: SheetConfiguration = DEFAULT_SHEET_CONFIGURATION
): SheetConfiguration {
  const merged: Required<SheetConfigurationInput> = { ...base };

  for (const key of Object.keys(input) as (keyof SheetConfigurationInput)[]) {
    if (input[key] !== undefined) {
      Object.assign(merged, { [key]: input[key] });
    }
  }

  return Object.freeze({
    ...merged,
    dimOpacity: clamp(finiteOr(merged.dimOpacity, base.dimOpacity), 0, 1),
    cornerRadius: Math.max(0, finiteOr(merged.cornerRadius, base.cornerRadius)),
    handleWidth: Math.max(0, finiteOr(merged.handleWidth, base.handleWidth)),
    handleHeight: Math.max(0, finiteOr(merged.handleHeight, base.handleHeight)),
  });
}

function finiteOr(value: number, fallback: number): number {
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Named configurations
 */
export const SheetPresets = {
  /** Handle, dismissable, dimmed backdrop, liquid glass */
  default: DEFAULT_SHEET_CONFIGURATION,

  /** Focused task: stronger dim, material surface */
  modal: resolveSheetConfiguration({
    dimOpacity: 0.4,
    tapBackgroundToDismiss: true,
    backgroundStyle: { kind: 'material', thickness: 'regular' },
    shadow: SHADOWS.prominent,
  }),

  /** Always visible, never dismissed, no dim */
  persistent: resolveSheetConfiguration({
    handleColor: 'rgba(60, 60, 67, 0.3)',
    handleWidth: 28,
    handleHeight: 4,
    isDismissable: false,
    isInteractiveDismissDisabled: true,
    dimBackground: false,
    backgroundStyle: { kind: 'translucent' },
    shadow: SHADOWS.subtle,
  }),

  /** Maps-style drawer: draggable, not dismissable, no dim */
  drawer: resolveSheetConfiguration({
    isDismissable: false,
    dimBackground: false,
    tapBackgroundToDismiss: false,
    backgroundStyle: { kind: 'material', thickness: 'regular' },
    cornerRadius: 16,
    shadow: SHADOWS.default,
  }),

  /** Full glass with a light dim */
  glass: resolveSheetConfiguration({
    handleColor: 'rgba(255, 255, 255, 0.5)',
    dimOpacity: 0.2,
    backgroundStyle: { kind: 'liquidGlass' },
    cornerRadius: 24,
    shadow: SHADOWS.prominent,
  }),

  /** Small content */
  compact: resolveSheetConfiguration({
    handleWidth: 28,
    handleHeight: 4,
    dimOpacity: 0.25,
    backgroundStyle: { kind: 'translucent' },
    cornerRadius: 12,
    shadow: SHADOWS.subtle,
  }),
} as const satisfies Record<string, SheetConfiguration>;

export type SheetPresetName = keyof typeof SheetPresets;
