/**
 * Surface Styles
 *
 * Turns panel appearance values into CSS and framer-motion transitions.
 */

import type { CSSProperties } from 'react';
import type { Transition } from 'framer-motion';
import type { BackgroundStyle, PanelTransition, ShadowSpec } from '../types/common';

const MATERIAL_FILL = {
  thin: { alpha: 0.5, blur: 10 },
  regular: { alpha: 0.65, blur: 20 },
  thick: { alpha: 0.8, blur: 30 },
} as const;

/**
 * Background CSS for a surface style
 */
export function backgroundCss(style: BackgroundStyle): CSSProperties {
  switch (style.kind) {
    case 'liquidGlass':
      return {
        background: 'rgba(255, 255, 255, 0.12)',
        backdropFilter: 'blur(40px) saturate(180%)',
        WebkitBackdropFilter: 'blur(40px) saturate(180%)',
      };
    case 'translucent':
      return {
        background: 'rgba(255, 255, 255, 0.7)',
        backdropFilter: 'blur(20px)',
        WebkitBackdropFilter: 'blur(20px)',
      };
    case 'solid': {
      const percent = Math.round(Math.max(0, Math.min(1, style.opacity)) * 100);
      return { background: `color-mix(in srgb, ${style.color} ${percent}%, transparent)` };
    }
    case 'material': {
      const fill = MATERIAL_FILL[style.thickness];
      return {
        background: `rgba(255, 255, 255, ${fill.alpha})`,
        backdropFilter: `blur(${fill.blur}px)`,
        WebkitBackdropFilter: `blur(${fill.blur}px)`,
      };
    }
  }
}

/**
 * CSS box-shadow for a shadow spec
 */
export function shadowCss(shadow: ShadowSpec): string {
  return `${shadow.x}px ${shadow.y}px ${shadow.radius}px ${shadow.color}`;
}

/**
 * framer-motion transition for a panel transition
 */
export function toMotionTransition(transition: PanelTransition): Transition {
  switch (transition.type) {
    case 'spring':
      return {
        type: 'spring',
        stiffness: transition.stiffness,
        damping: transition.damping,
        mass: transition.mass,
      };
    case 'tween':
      return { type: 'tween', duration: transition.duration, ease: transition.ease };
    case 'instant':
      return { duration: 0 };
  }
}
