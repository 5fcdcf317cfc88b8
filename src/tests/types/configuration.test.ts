/**
 * Sheet and Menu Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_SHEET_CONFIGURATION,
  SheetPresets,
  resolveSheetConfiguration,
} from '../../types/sheet';
import {
  DEFAULT_MENU_CONFIGURATION,
  MenuPresets,
  isVerticalDrag,
  resolveMenuConfiguration,
} from '../../types/menu';
import { SHADOWS, springTransition } from '../../types/common';

describe('springTransition', () => {
  it('should convert response and damping fraction to stiffness and damping', () => {
    const transition = springTransition({ response: 0.35, dampingFraction: 0.8 });
    expect(transition.type).toBe('spring');
    if (transition.type !== 'spring') return;

    expect(transition.stiffness).toBeCloseTo(322.27, 2);
    expect(transition.damping).toBeCloseTo(28.72, 2);
    expect(transition.mass).toBe(1);
  });

  it('should clamp the damping fraction', () => {
    const transition = springTransition({ response: 0.2, dampingFraction: 3 });
    if (transition.type !== 'spring') throw new Error('expected a spring');
    expect(transition.damping).toBeCloseTo(62.83, 2);
  });
});

describe('resolveSheetConfiguration', () => {
  it('should fill every field from the defaults', () => {
    expect(resolveSheetConfiguration()).toEqual(DEFAULT_SHEET_CONFIGURATION);
  });

  it('should keep defaults for undefined fields', () => {
    const config = resolveSheetConfiguration({ showHandle: undefined, cornerRadius: 8 });
    expect(config.showHandle).toBe(true);
    expect(config.cornerRadius).toBe(8);
  });

  it('should clamp numeric ranges', () => {
    const config = resolveSheetConfiguration({
      dimOpacity: 1.4,
      cornerRadius: -4,
      handleWidth: -1,
      handleHeight: Number.NaN,
    });
    expect(config.dimOpacity).toBe(1);
    expect(config.cornerRadius).toBe(0);
    expect(config.handleWidth).toBe(0);
    expect(config.handleHeight).toBe(5);
  });

  it('should layer input over a base configuration', () => {
    const config = resolveSheetConfiguration({ dimOpacity: 0.1 }, SheetPresets.drawer);
    expect(config.isDismissable).toBe(false);
    expect(config.dimOpacity).toBe(0.1);
  });

  it('should return frozen configurations', () => {
    expect(Object.isFrozen(resolveSheetConfiguration({ cornerRadius: 12 }))).toBe(true);
  });
});

describe('SheetPresets', () => {
  it('should make persistent sheets non-dismissable and gesture-free', () => {
    expect(SheetPresets.persistent).toMatchObject({
      isDismissable: false,
      isInteractiveDismissDisabled: true,
      dimBackground: false,
      handleWidth: 28,
      handleHeight: 4,
      shadow: SHADOWS.subtle,
    });
  });

  it('should keep drawers draggable but not dismissable', () => {
    expect(SheetPresets.drawer).toMatchObject({
      isDismissable: false,
      isInteractiveDismissDisabled: false,
      tapBackgroundToDismiss: false,
      cornerRadius: 16,
    });
  });

  it('should dim modal sheets more than the default', () => {
    expect(SheetPresets.modal.dimOpacity).toBe(0.4);
    expect(SheetPresets.modal.backgroundStyle).toEqual({ kind: 'material', thickness: 'regular' });
  });
});

describe('resolveMenuConfiguration', () => {
  it('should fill defaults', () => {
    expect(resolveMenuConfiguration()).toEqual(DEFAULT_MENU_CONFIGURATION);
    expect(DEFAULT_MENU_CONFIGURATION.dragDismissalThreshold).toBe(96);
    expect(DEFAULT_MENU_CONFIGURATION.actionDelayMs).toBe(300);
  });

  it('should replace a non-positive dismissal threshold', () => {
    expect(resolveMenuConfiguration({ dragDismissalThreshold: 0 }).dragDismissalThreshold).toBe(96);
    expect(resolveMenuConfiguration({ dragDismissalThreshold: 150 }).dragDismissalThreshold).toBe(150);
  });

  it('should not allow a negative action delay', () => {
    expect(resolveMenuConfiguration({ actionDelayMs: -10 }).actionDelayMs).toBe(0);
  });

  it('should provide presets', () => {
    expect(MenuPresets.premium).toMatchObject({ accentColor: '#FF9F0A', cornerRadius: 32 });
    expect(MenuPresets.minimal.backgroundStyle).toEqual({ kind: 'translucent' });
  });

  it('should drag vertically only for bottom sheet menus', () => {
    expect(isVerticalDrag('bottomSheet')).toBe(true);
    expect(isVerticalDrag('trailingPanel')).toBe(false);
  });
});
