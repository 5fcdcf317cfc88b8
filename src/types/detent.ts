/**
 * Detent Types
 *
 * A detent is a rule for the rest extent of a draggable panel,
 * evaluated against the extent of the container it lives in.
 */

import { clamp, sanitizeExtent } from './common';

// ============================================================================
// Detent
// ============================================================================

export type Detent =
  | { readonly kind: 'small' }
  | { readonly kind: 'medium' }
  | { readonly kind: 'large' }
  | { readonly kind: 'fraction'; readonly fraction: number }
  | { readonly kind: 'fixed'; readonly extent: number };

export type DetentKind = Detent['kind'];

/**
 * Reference container extent used for ordering, so that relative order
 * never depends on the live container size.
 */
export const DETENT_REFERENCE_EXTENT = 1000;

/**
 * Resolution constants
 */
export const DETENT_RULES = {
  smallMinimum: 120,
  smallRatio: 0.15,
  mediumRatio: 0.5,
  largeRatio: 0.9,
  fractionMin: 0.1,
  fractionMax: 1.0,
  fixedMaxRatio: 0.95,
} as const;

const SMALL: Detent = Object.freeze({ kind: 'small' });
const MEDIUM: Detent = Object.freeze({ kind: 'medium' });
const LARGE: Detent = Object.freeze({ kind: 'large' });

/**
 * Detent constructors
 *
 * @example
 * ```ts
 * const detents = [Detents.fixed(200), Detents.fraction(0.6), Detents.large];
 * ```
 */
export const Detents = {
  small: SMALL,
  medium: MEDIUM,
  large: LARGE,
  fraction(fraction: number): Detent {
    return Object.freeze({ kind: 'fraction', fraction });
  },
  fixed(extent: number): Detent {
    return Object.freeze({ kind: 'fixed', extent });
  },
} as const;

// ============================================================================
// Resolution
// ============================================================================

/**
 * Absolute extent of a detent inside a container.
 * Always within [0, containerExtent].
 */
export function resolveDetentExtent(detent: Detent, containerExtent: number): number {
  const container = sanitizeExtent(containerExtent);

  let extent: number;
  switch (detent.kind) {
    case 'small':
      extent = Math.max(DETENT_RULES.smallMinimum, container * DETENT_RULES.smallRatio);
      break;
    case 'medium':
      extent = container * DETENT_RULES.mediumRatio;
      break;
    case 'large':
      extent = container * DETENT_RULES.largeRatio;
      break;
    case 'fraction': {
      // NaN fractions fall to the lower bound
      const fraction = Number.isNaN(detent.fraction)
        ? DETENT_RULES.fractionMin
        : clamp(detent.fraction, DETENT_RULES.fractionMin, DETENT_RULES.fractionMax);
      extent = container * fraction;
      break;
    }
    case 'fixed':
      extent = Number.isNaN(detent.extent)
        ? 0
        : Math.min(detent.extent, container * DETENT_RULES.fixedMaxRatio);
      break;
  }

  return clamp(extent, 0, container);
}

// ============================================================================
// Identity & Description
// ============================================================================

/**
 * Stable identifier for a detent
 */
export function getDetentId(detent: Detent): string {
  switch (detent.kind) {
    case 'small':
    case 'medium':
    case 'large':
      return detent.kind;
    case 'fraction':
      return `fraction-${detent.fraction}`;
    case 'fixed':
      return `fixed-${detent.extent}`;
  }
}

/**
 * Structural equality
 */
export function isSameDetent(a: Detent, b: Detent): boolean {
  return getDetentId(a) === getDetentId(b);
}

/**
 * Human-readable description, used as ARIA value text
 */
export function describeDetent(detent: Detent): string {
  switch (detent.kind) {
    case 'small':
      return 'collapsed';
    case 'medium':
      return 'half height';
    case 'large':
      return 'expanded';
    case 'fraction':
      return `${Math.trunc(detent.fraction * 100)} percent`;
    case 'fixed':
      return `${Math.trunc(detent.extent)} points`;
  }
}

/**
 * Order two detents by their extent at the reference container
 */
export function compareDetents(
  a: Detent,
  b: Detent,
  referenceExtent: number = DETENT_REFERENCE_EXTENT
): number {
  return resolveDetentExtent(a, referenceExtent) - resolveDetentExtent(b, referenceExtent);
}
