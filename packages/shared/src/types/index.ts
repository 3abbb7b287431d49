/**
 * Shared type definitions
 */

// ============================================================================
// Geometry Types
// ============================================================================

/** Integer pixel coordinate on the drawing surface */
export interface Point {
  x: number;
  y: number;
}

/** Pixel dimensions of a window or widget */
export interface Size {
  width: number;
  height: number;
}

/** Axis-aligned rectangle in pixels (top-left origin) */
export interface Rect {
  x: number;
  y: number;
  w: number;
  h: number;
}

// ============================================================================
// Color Types
// ============================================================================

/** 8-bit RGB color */
export interface Rgb {
  r: number;
  g: number;
  b: number;
}

// ============================================================================
// Randomness
// ============================================================================

/** Uniform source in [0, 1), same contract as Math.random */
export type RandomSource = () => number;
