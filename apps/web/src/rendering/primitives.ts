/**
 * Canvas Primitives
 *
 * Low-level drawing primitives for canvas rendering.
 * These are stateless functions that take a surface and draw shapes.
 */

import type { Rect, Rgb, Size } from '@beepbutton/shared';
import { colorToCss } from '../utils/colors.js';
import type { DrawSurface } from './types.js';

/**
 * Fill the whole surface with one color
 */
export function clearSurface(surface: DrawSurface, size: Size, color: Rgb): void {
  surface.fillStyle = colorToCss(color);
  surface.fillRect(0, 0, size.width, size.height);
}

/**
 * Draw a filled rectangle
 */
export function fillRect(surface: DrawSurface, rect: Rect, color: Rgb): void {
  surface.fillStyle = colorToCss(color);
  surface.fillRect(rect.x, rect.y, rect.w, rect.h);
}

/**
 * Draw a rectangle outline that stays inside the rect's pixels.
 * Strokes are centered on the path, so the path is inset by half the line width.
 */
export function strokeRectInside(surface: DrawSurface, rect: Rect, color: Rgb, lineWidth = 1): void {
  const inset = lineWidth / 2;
  surface.strokeStyle = colorToCss(color);
  surface.lineWidth = lineWidth;
  surface.strokeRect(rect.x + inset, rect.y + inset, rect.w - lineWidth, rect.h - lineWidth);
}
