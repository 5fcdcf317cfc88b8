/**
 * Flow Layout
 *
 * Places items left to right and wraps onto a new line when the next
 * item would overflow the available width. Used for chip and tag groups.
 */

import type { Point2D, Size2D } from '../types/common';

export interface FlowLayoutResult {
  /** Top-left of each item, in input order */
  positions: Point2D[];
  /** Bounding size of the arranged items */
  size: Size2D;
  /** Number of lines used */
  lineCount: number;
}

/**
 * Arrange measured item sizes into wrapped lines.
 * An item wider than `maxWidth` still gets a line of its own.
 */
export function arrangeFlow(
  sizes: readonly Size2D[],
  maxWidth: number = Number.POSITIVE_INFINITY,
  spacing: number = 8
): FlowLayoutResult {
  const positions: Point2D[] = [];
  let currentX = 0;
  let currentY = 0;
  let lineHeight = 0;
  let totalWidth = 0;
  let lineCount = sizes.length > 0 ? 1 : 0;

  for (const size of sizes) {
    if (currentX + size.width > maxWidth && currentX > 0) {
      currentX = 0;
      currentY += lineHeight + spacing;
      lineHeight = 0;
      lineCount += 1;
    }

    positions.push({ x: currentX, y: currentY });
    lineHeight = Math.max(lineHeight, size.height);
    currentX += size.width + spacing;
    totalWidth = Math.max(totalWidth, currentX - spacing);
  }

  return {
    positions,
    size: { width: totalWidth, height: currentY + lineHeight },
    lineCount,
  };
}
