/**
 * Sheet Presenter Tests
 *
 * Presentation state, gesture gating, interactive dismiss and frames.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SheetPresenter, type SheetPresenterOptions } from '../../systems/SheetPresenter';
import { DragSnapController } from '../../systems/DragSnapController';
import { createPanelEventBus, type PanelEventBusImpl } from '../../systems/PanelEventBus';
import { createPanelErrorHandler, type PanelErrorHandlerImpl } from '../../systems/PanelErrorHandler';
import { DEFAULT_SHEET_CONFIGURATION, SheetPresets } from '../../types/sheet';
import { Detents } from '../../types/detent';
import { INSTANT_TRANSITION } from '../../types/common';
import type { PanelEventType } from '../../types/contracts';

const { small, medium, large } = Detents;

describe('SheetPresenter', () => {
  let bus: PanelEventBusImpl;
  let errors: PanelErrorHandlerImpl;
  let presenter: SheetPresenter;
  let eventTypes: PanelEventType[];

  const create = (options: SheetPresenterOptions = {}) =>
    new SheetPresenter({
      detents: [small, medium, large],
      initialDetent: medium,
      containerExtent: 800,
      panelId: 'test-sheet',
      isPresented: true,
      debug: false,
      eventBus: bus,
      errorHandler: errors,
      ...options,
    });

  beforeEach(() => {
    bus = createPanelEventBus();
    errors = createPanelErrorHandler({ eventBus: bus, debug: false });
    eventTypes = [];
    bus.subscribeAll((event) => eventTypes.push(event.type));
    presenter = create();
  });

  afterEach(() => {
    presenter.dispose();
  });

  describe('frame', () => {
    it('should describe the settled sheet', () => {
      expect(presenter.getFrame()).toEqual({
        isPresented: true,
        phase: 'settled',
        currentDetent: medium,
        detentDescription: 'half height',
        displayExtent: 400,
        containerExtent: 800,
        backdropOpacity: 0.3,
        showHandle: true,
        cornerRadius: 20,
        transition: DEFAULT_SHEET_CONFIGURATION.transition,
      });
    });

    it('should follow the finger without animation while dragging', () => {
      presenter.beginDrag();
      presenter.dragUpdate(100);

      const frame = presenter.getFrame();
      expect(frame.phase).toBe('dragging');
      expect(frame.displayExtent).toBe(300);
      expect(frame.transition).toEqual(INSTANT_TRANSITION);
    });

    it('should use instant transitions when motion is reduced', () => {
      presenter.setReduceMotion(true);
      expect(presenter.getFrame().transition).toEqual(INSTANT_TRANSITION);
    });

    it('should not dim without dimBackground', () => {
      const drawer = create({ configuration: SheetPresets.drawer });
      expect(drawer.getFrame().backdropOpacity).toBe(0);
      drawer.dispose();
    });

    it('should notify subscribers with the new frame', () => {
      const listener = vi.fn();
      const unsubscribe = presenter.subscribe(listener);

      presenter.adjust('increment');
      expect(listener).toHaveBeenLastCalledWith(expect.objectContaining({ currentDetent: large }));

      unsubscribe();
      presenter.adjust('decrement');
      expect(listener).toHaveBeenCalledTimes(1);
    });
  });

  describe('presentation', () => {
    it('should start hidden unless presented', () => {
      const hidden = create({ isPresented: false });
      expect(hidden.isPresented).toBe(false);
      expect(hidden.getFrame().backdropOpacity).toBe(0);

      hidden.present();
      hidden.present();
      expect(hidden.isPresented).toBe(true);
      expect(eventTypes.filter((type) => type === 'panel:presented')).toHaveLength(1);
      hidden.dispose();
    });

    it('should dismiss and report the reason', () => {
      const onDismiss = vi.fn();
      presenter.setOnDismiss(onDismiss);

      expect(presenter.dismiss()).toBe(true);
      expect(presenter.dismiss()).toBe(false);

      expect(presenter.isPresented).toBe(false);
      expect(onDismiss).toHaveBeenCalledTimes(1);
      expect(onDismiss).toHaveBeenCalledWith('command');
      expect(eventTypes).toEqual(['panel:dismissed']);
    });

    it('should keep persistent sheets on screen', () => {
      const persistent = create({ presentation: 'persistent', isPresented: false });
      expect(persistent.isPresented).toBe(true);
      expect(persistent.dismiss()).toBe(false);
      expect(persistent.isPresented).toBe(true);
      persistent.dispose();
    });

    it('should survive a throwing onDismiss', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      presenter.setOnDismiss(() => {
        throw new Error('host failed');
      });

      expect(presenter.dismiss()).toBe(true);
      expect(errorSpy).toHaveBeenCalledWith('[SheetPresenter:test-sheet] onDismiss failed:', expect.any(Error));
      errorSpy.mockRestore();
    });
  });

  describe('gestures', () => {
    it('should forward drags to the controller', () => {
      presenter.beginDrag();
      presenter.dragUpdate(-30);
      presenter.dragEnd(-600);
      expect(presenter.controller.currentDetent).toBe(large);
    });

    it('should ignore drags while hidden', () => {
      presenter.dismiss();
      presenter.beginDrag();
      expect(presenter.controller.phase).toBe('settled');
    });

    it('should ignore drags when interactive dismiss is disabled', () => {
      const locked = create({ configuration: { isInteractiveDismissDisabled: true } });
      expect(locked.acceptsGestures).toBe(false);
      locked.beginDrag();
      expect(locked.controller.phase).toBe('settled');
      locked.dispose();
    });

    it('should pass the configured snap tuning to the controller', () => {
      const tuned = create({ configuration: { velocityThreshold: 900, velocityDampingFactor: 0.1 } });
      expect(tuned.controller.velocityThreshold).toBe(900);
      expect(tuned.controller.velocityDampingFactor).toBe(0.1);
      tuned.dispose();
    });

    it('should cancel through to the controller', () => {
      presenter.beginDrag();
      presenter.dragUpdate(40);
      presenter.cancelDrag();
      expect(presenter.controller.getState()).toMatchObject({ phase: 'settled', liveDragOffset: 0 });
    });
  });

  describe('interactive dismiss', () => {
    it('should dismiss a slow release projected below half the smallest detent', () => {
      const onDismiss = vi.fn();
      presenter.setOnDismiss(onDismiss);

      presenter.beginDrag();
      presenter.dragUpdate(360);
      // 400 - 360 = 40, below 60
      presenter.dragEnd(0);

      expect(presenter.isPresented).toBe(false);
      expect(onDismiss).toHaveBeenCalledWith('drag');
      expect(presenter.controller.currentDetent).toBe(medium);
      expect(presenter.controller.phase).toBe('settled');
    });

    it('should dismiss a downward flick from the smallest detent', () => {
      const sheet = create({ initialDetent: small });
      sheet.beginDrag();
      sheet.dragEnd(800);
      expect(sheet.isPresented).toBe(false);
      sheet.dispose();
    });

    it('should collapse one step on a downward flick from a larger detent', () => {
      presenter.beginDrag();
      presenter.dragEnd(800);
      expect(presenter.isPresented).toBe(true);
      expect(presenter.controller.currentDetent).toBe(small);
    });

    it('should settle instead of dismissing when not dismissable', () => {
      const drawer = create({ configuration: SheetPresets.drawer });
      drawer.beginDrag();
      drawer.dragUpdate(360);
      drawer.dragEnd(0);

      expect(drawer.isPresented).toBe(true);
      expect(drawer.controller.currentDetent).toBe(small);
      drawer.dispose();
    });
  });

  describe('taps and adjust', () => {
    it('should cycle detents from the handle', () => {
      presenter.tapHandle();
      expect(presenter.controller.currentDetent).toBe(large);
      presenter.tapHandle();
      expect(presenter.controller.currentDetent).toBe(small);
    });

    it('should ignore handle taps when cycling is off', () => {
      const sheet = create({ configuration: { tapHandleToCycle: false } });
      sheet.tapHandle();
      expect(sheet.controller.currentDetent).toBe(medium);
      sheet.dispose();
    });

    it('should dismiss on backdrop tap', () => {
      const onDismiss = vi.fn();
      presenter.setOnDismiss(onDismiss);
      presenter.tapBackdrop();
      expect(onDismiss).toHaveBeenCalledWith('backdrop');
    });

    it('should ignore backdrop taps without a dimmed backdrop', () => {
      const sheet = create({ configuration: { dimBackground: false } });
      sheet.tapBackdrop();
      expect(sheet.isPresented).toBe(true);
      sheet.dispose();
    });

    it('should expand and collapse on adjust', () => {
      presenter.adjust('increment');
      expect(presenter.controller.currentDetent).toBe(large);
      presenter.adjust('decrement');
      presenter.adjust('decrement');
      expect(presenter.controller.currentDetent).toBe(small);
    });
  });

  describe('dispose', () => {
    it('should dispose a controller it created', () => {
      presenter.dispose();
      expect(presenter.isDisposed).toBe(true);
      expect(presenter.controller.isDisposed).toBe(true);
    });

    it('should leave an injected controller alone', () => {
      const controller = new DragSnapController({ eventBus: bus, errorHandler: errors });
      const sheet = new SheetPresenter({ controller, eventBus: bus });

      sheet.dispose();
      expect(controller.isDisposed).toBe(false);
      controller.dispose();
    });

    it('should ignore presentation changes after dispose', () => {
      presenter.dispose();
      expect(presenter.dismiss()).toBe(false);
      expect(presenter.isPresented).toBe(true);
    });
  });
});
