/**
 * SlideMenu Component Tests
 */

import React from 'react';
import { render, screen, fireEvent, waitFor } from '@testing-library/react';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SlideMenu } from '../../components/menu/SlideMenu';
import { createPanelEventBus, type PanelEventBusImpl } from '../../systems/PanelEventBus';
import { createPanelErrorHandler, type PanelErrorHandlerImpl } from '../../systems/PanelErrorHandler';
import type { MenuItem } from '../../types/menu';

describe('SlideMenu', () => {
  let bus: PanelEventBusImpl;
  let errors: PanelErrorHandlerImpl;
  let items: MenuItem[];

  beforeEach(() => {
    bus = createPanelEventBus();
    errors = createPanelErrorHandler({ eventBus: bus, debug: false });
    items = [
      { id: 'share', title: 'Share', action: vi.fn() },
      { id: 'settings', title: 'Settings', subtitle: 'Account and privacy', badge: '2', action: vi.fn() },
      { id: 'sign-out', title: 'Sign out', isDestructive: true, action: vi.fn() },
    ];
  });

  it('should list items when presented', () => {
    render(<SlideMenu items={items} isPresented title="Options" eventBus={bus} errorHandler={errors} />);

    expect(screen.getByRole('navigation', { name: 'Options' })).toBeInTheDocument();
    expect(screen.getByRole('heading', { name: 'Options' })).toBeInTheDocument();
    expect(screen.getAllByRole('button')).toHaveLength(3);
    expect(screen.getByText('Account and privacy')).toBeInTheDocument();
    expect(screen.getByText('2')).toBeInTheDocument();
  });

  it('should render nothing while not presented', () => {
    render(<SlideMenu items={items} isPresented={false} eventBus={bus} errorHandler={errors} />);
    expect(screen.queryByRole('navigation')).not.toBeInTheDocument();
  });

  it('should run an item action after dismissing', async () => {
    const onDismiss = vi.fn();
    render(
      <SlideMenu items={items} isPresented onDismiss={onDismiss} eventBus={bus} errorHandler={errors} />
    );

    fireEvent.click(screen.getByRole('button', { name: 'Share' }));

    expect(onDismiss).toHaveBeenCalledTimes(1);
    expect(items[0].action).not.toHaveBeenCalled();
    await waitFor(() => {
      expect(items[0].action).toHaveBeenCalledTimes(1);
    });
  });

  it('should dismiss on outside tap', () => {
    const onDismiss = vi.fn();
    render(
      <SlideMenu items={items} isPresented onDismiss={onDismiss} eventBus={bus} errorHandler={errors} />
    );

    fireEvent.click(screen.getByTestId('menu-backdrop'));
    expect(onDismiss).toHaveBeenCalledTimes(1);
  });

  it('should publish menu events', () => {
    const presented = vi.fn();
    bus.on('menu:presented', presented);

    render(<SlideMenu items={items} isPresented menuId="main-menu" eventBus={bus} errorHandler={errors} />);

    expect(presented).toHaveBeenCalledTimes(1);
    expect(presented.mock.calls[0][0]).toMatchObject({ panelId: 'main-menu', payload: { itemCount: 3 } });
  });
});
