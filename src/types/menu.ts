/**
 * Slide-in Menu Types
 */

import {
  springTransition,
  PANEL_TIMING,
  SHADOWS,
  type BackgroundStyle,
  type PanelTransition,
  type ShadowSpec,
} from './common';

/**
 * Edge the menu enters from
 */
export type MenuPresentationStyle = 'bottomSheet' | 'trailingPanel';

/**
 * Menu entry
 */
export interface MenuItem {
  id: string;
  title: string;
  subtitle?: string;
  /** Icon name understood by the host's icon set */
  icon?: string;
  badge?: string;
  isDestructive?: boolean;
  action: () => void;
}

/**
 * Menu configuration (input)
 */
export interface MenuConfigurationInput {
  presentationStyle?: MenuPresentationStyle;
  menuWidth?: number;
  cornerRadius?: number;
  accentColor?: string;
  backgroundStyle?: BackgroundStyle;
  shadow?: ShadowSpec;
  allowsDragToDismiss?: boolean;
  dismissOnOutsideTap?: boolean;
  /** Drag distance that dismisses on release */
  dragDismissalThreshold?: number;
  /** Delay between dismissal and running an item's action (ms) */
  actionDelayMs?: number;
  presentationTransition?: PanelTransition;
  dismissalTransition?: PanelTransition;
}

export type MenuConfiguration = Readonly<Required<MenuConfigurationInput>>;

export const DEFAULT_MENU_CONFIGURATION: MenuConfiguration = Object.freeze<MenuConfiguration>({
  presentationStyle: 'trailingPanel',
  menuWidth: 320,
  cornerRadius: 28,
  accentColor: '#0A84FF',
  backgroundStyle: { kind: 'liquidGlass' },
  shadow: SHADOWS.default,
  allowsDragToDismiss: true,
  dismissOnOutsideTap: true,
  dragDismissalThreshold: 96,
  actionDelayMs: PANEL_TIMING.menuActionDelay,
  presentationTransition: springTransition({ response: 0.4, dampingFraction: 0.85 }),
  dismissalTransition: { type: 'tween', duration: 0.25, ease: 'easeInOut' },
});

/**
 * Merge input over the defaults
 */
export function resolveMenuConfiguration(
  input: MenuConfigurationInput = {}
): MenuConfiguration {
  const threshold = input.dragDismissalThreshold;

  return Object.freeze({
    presentationStyle: input.presentationStyle ?? DEFAULT_MENU_CONFIGURATION.presentationStyle,
    menuWidth: input.menuWidth ?? DEFAULT_MENU_CONFIGURATION.menuWidth,
    cornerRadius: Math.max(0, input.cornerRadius ?? DEFAULT_MENU_CONFIGURATION.cornerRadius),
    accentColor: input.accentColor ?? DEFAULT_MENU_CONFIGURATION.accentColor,
    backgroundStyle: input.backgroundStyle ?? DEFAULT_MENU_CONFIGURATION.backgroundStyle,
    shadow: input.shadow ?? DEFAULT_MENU_CONFIGURATION.shadow,
    allowsDragToDismiss: input.allowsDragToDismiss ?? DEFAULT_MENU_CONFIGURATION.allowsDragToDismiss,
    dismissOnOutsideTap: input.dismissOnOutsideTap ?? DEFAULT_MENU_CONFIGURATION.dismissOnOutsideTap,
    // A zero threshold would dismiss on any touch
    dragDismissalThreshold:
      threshold !== undefined && threshold > 0
        ? threshold
        : DEFAULT_MENU_CONFIGURATION.dragDismissalThreshold,
    actionDelayMs: Math.max(0, input.actionDelayMs ?? DEFAULT_MENU_CONFIGURATION.actionDelayMs),
    presentationTransition:
      input.presentationTransition ?? DEFAULT_MENU_CONFIGURATION.presentationTransition,
    dismissalTransition: input.dismissalTransition ?? DEFAULT_MENU_CONFIGURATION.dismissalTransition,
  });
}

export const MenuPresets = {
  default: DEFAULT_MENU_CONFIGURATION,
  premium: resolveMenuConfiguration({ accentColor: '#FF9F0A', cornerRadius: 32 }),
  minimal: resolveMenuConfiguration({
    backgroundStyle: { kind: 'translucent' },
    cornerRadius: 24,
    shadow: SHADOWS.subtle,
  }),
} as const satisfies Record<string, MenuConfiguration>;

/**
 * Whether drags along this style's dismissal axis are vertical
 */
export function isVerticalDrag(style: MenuPresentationStyle): boolean {
  return style === 'bottomSheet';
}
