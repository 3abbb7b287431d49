/**
 * Color utility functions for Beep Button
 */

import type { Rgb } from '@beepbutton/shared';

/**
 * Convert RGB color object to CSS rgb() string
 */
export function colorToCss(color: Rgb): string {
  return `rgb(${color.r}, ${color.g}, ${color.b})`;
}

/**
 * Uniform gray with all three channels at `level`
 */
export function gray(level: number): Rgb {
  return { r: level, g: level, b: level };
}
