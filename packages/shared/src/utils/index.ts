/**
 * Shared utility functions
 */

import type { Point, RandomSource, Rect, Size } from '../types/index.js';

// ============================================================================
// Geometry Utilities
// ============================================================================

/**
 * Half-open hit test: the left/top edges are inside, the right/bottom edges are not.
 */
export function pointInRect(point: Point, rect: Rect): boolean {
  return (
    point.x >= rect.x &&
    point.x < rect.x + rect.w &&
    point.y >= rect.y &&
    point.y < rect.y + rect.h
  );
}

/**
 * Center a box of the given size inside a container.
 * Offsets use integer division (truncated toward zero), so they can go negative
 * when the container is smaller than the box.
 */
export function centerRect(container: Size, size: Size): Rect {
  return {
    x: Math.trunc((container.width - size.width) / 2),
    y: Math.trunc((container.height - size.height) / 2),
    w: size.width,
    h: size.height,
  };
}

// ============================================================================
// Random Utilities
// ============================================================================

/**
 * Uniform integer in the closed range [min, max]
 */
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return min + Math.floor(random() * (max - min + 1));
}
