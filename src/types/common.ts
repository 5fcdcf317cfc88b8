/**
 * Detent Panels Common Types
 *
 * Shared primitives used across the panel layer.
 */

// ============================================================================
// Geometry
// ============================================================================

/**
 * 2D point/position
 */
export interface Point2D {
  x: number;
  y: number;
}

/**
 * 2D size
 */
export interface Size2D {
  width: number;
  height: number;
}

/**
 * Clamp a value into [min, max]
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Non-negative, finite extent (anything else collapses to 0)
 */
export function sanitizeExtent(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

// ============================================================================
// Motion
// ============================================================================

/**
 * Panel timing constants
 */
export const PANEL_TIMING = {
  // Snap decision
  velocityThreshold: 500, // units per second
  velocityDampingFactor: 0.2,
  velocitySampleWindow: 100, // ms

  // Spring physics (seconds / fraction)
  sheetResponse: 0.35,
  sheetDampingFraction: 0.8,
  handleResponse: 0.2,
  handleDampingFraction: 0.7,

  // Menu
  menuActionDelay: 300, // ms
  menuSnapBackResponse: 0.3,
  menuSnapBackDampingFraction: 0.7,
} as const;

/**
 * Spring described the way sheet transitions are authored
 */
export interface SpringSpec {
  /** Approximate settle time in seconds */
  response: number;
  /** 0 = undamped, 1 = critically damped */
  dampingFraction: number;
}

/**
 * Transition handed to the animation layer
 */
export type PanelTransition =
  | { type: 'spring'; stiffness: number; damping: number; mass: number }
  | { type: 'tween'; duration: number; ease: 'easeOut' | 'easeInOut' | 'linear' }
  | { type: 'instant' };

/**
 * Convert a response/damping-fraction spring into stiffness/damping
 */
export function springTransition(spec: SpringSpec, mass = 1): PanelTransition {
  const response = Math.max(0.01, spec.response);
  const stiffness = Math.pow((2 * Math.PI) / response, 2) * mass;
  const damping = 4 * Math.PI * clamp(spec.dampingFraction, 0, 1) * mass / response;

  return { type: 'spring', stiffness, damping, mass };
}

/**
 * Transition used when motion is reduced
 */
export const INSTANT_TRANSITION: PanelTransition = { type: 'instant' };

// ============================================================================
// Appearance
// ============================================================================

/**
 * Surface background styles
 */
export type BackgroundStyle =
  | { kind: 'liquidGlass' }
  | { kind: 'translucent' }
  | { kind: 'solid'; color: string; opacity: number }
  | { kind: 'material'; thickness: 'thin' | 'regular' | 'thick' };

/**
 * Drop shadow
 */
export interface ShadowSpec {
  color: string;
  radius: number;
  x: number;
  y: number;
}

/**
 * Shadow presets
 */
export const SHADOWS = {
  subtle: { color: 'rgba(0, 0, 0, 0.08)', radius: 8, x: 0, y: 2 },
  default: { color: 'rgba(0, 0, 0, 0.15)', radius: 12, x: 0, y: 4 },
  prominent: { color: 'rgba(0, 0, 0, 0.25)', radius: 24, x: 0, y: -4 },
} as const satisfies Record<string, ShadowSpec>;

// ============================================================================
// Identifiers
// ============================================================================

/**
 * Generate a unique ID
 */
export function generateId(prefix = 'panel'): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return `${prefix}_${timestamp}_${random}`;
}
