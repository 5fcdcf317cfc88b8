/**
 * Detent Panels
 *
 * Draggable bottom sheets that snap between detents, plus a slide-in
 * menu. The controllers are framework-free; hooks and components bind
 * them to React and framer-motion.
 */

// =============================================================================
// Types
// =============================================================================

export * from './types';

// =============================================================================
// Systems
// =============================================================================

export * from './systems';

// =============================================================================
// Stores
// =============================================================================

export {
  createPanelStore,
  getPanelStore,
  getRegisteredPanelStores,
  registerPanelStore,
  unregisterPanelStore,
  type PanelStore,
  type PanelStoreState,
  type PanelStoreConfig,
  type PanelPhase,
} from './stores/panelStore';

// =============================================================================
// Hooks
// =============================================================================

export * from './hooks';

// =============================================================================
// Components
// =============================================================================

export * from './components';

// =============================================================================
// Utilities
// =============================================================================

export * from './utils';
