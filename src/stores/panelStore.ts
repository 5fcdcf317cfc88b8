/**
 * Panel Store Factory
 *
 * Per-panel observable state. Each controller owns one vanilla zustand
 * store; React reads it through `useStore`, everything else through
 * `subscribe` with a selector.
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector, devtools } from 'zustand/middleware';
import type { Detent } from '../types/detent';

/**
 * Gesture phase of a panel
 */
export type PanelPhase = 'settled' | 'dragging';

/**
 * Observable panel state
 */
export interface PanelStoreState {
  /** Settled position */
  currentDetent: Detent;
  /** Offset of the active drag (positive = toward smaller extent) */
  liveDragOffset: number;
  /** Container extent pushed in by the host */
  containerExtent: number;
  /** Gesture phase */
  phase: PanelPhase;
  /** Extent the presenter should render */
  displayExtent: number;
}

/**
 * Store configuration
 */
export interface PanelStoreConfig {
  /** Store name (devtools label and registry key) */
  name: string;
  /** Initial state */
  initialState: PanelStoreState;
  /** Connect to Redux devtools when available */
  devtools?: boolean;
  /** Add the store to the registry on creation (default true) */
  register?: boolean;
}

function buildStore(config: PanelStoreConfig) {
  return createStore<PanelStoreState>()(
    devtools(
      subscribeWithSelector(() => ({ ...config.initialState })),
      { name: `panel:${config.name}`, enabled: config.devtools ?? false }
    )
  );
}

export type PanelStore = ReturnType<typeof buildStore>;

/**
 * Create a panel store and register it under its name
 */
export function createPanelStore(config: PanelStoreConfig): PanelStore {
  const store = buildStore(config);
  if (config.register ?? true) {
    registerPanelStore(config.name, store);
  }
  return store;
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Live panel stores, for debugging
 */
const storeRegistry = new Map<string, PanelStore>();

/**
 * Get all registered stores
 */
export function getRegisteredPanelStores(): Map<string, PanelStore> {
  return new Map(storeRegistry);
}

/**
 * Get a specific store by panel name
 */
export function getPanelStore(name: string): PanelStore | undefined {
  return storeRegistry.get(name);
}

/**
 * Add a store to the registry, replacing any store under the same name
 */
export function registerPanelStore(name: string, store: PanelStore): void {
  storeRegistry.set(name, store);
}

/**
 * Drop a store from the registry. When `store` is given, the entry is only
 * dropped while it still points at that store.
 */
export function unregisterPanelStore(name: string, store?: PanelStore): void {
  if (store !== undefined && storeRegistry.get(name) !== store) return;
  storeRegistry.delete(name);
}
