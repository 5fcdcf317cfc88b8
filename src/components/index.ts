/**
 * Panel Components
 */

export * from './sheet';
export * from './menu';
