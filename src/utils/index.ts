/**
 * Panel Utilities
 */

export { arrangeFlow, type FlowLayoutResult } from './flowLayout';
export { backgroundCss, shadowCss, toMotionTransition } from './surfaceStyles';
