/**
 * Label Rendering
 *
 * Centered single-line text. Measurements are cached per (text, font, color)
 * and never invalidated; the label is static for the lifetime of the app.
 */

import type { Rect } from '@beepbutton/shared';
import type { DrawSurface, LabelSize, LabelStyle } from './types.js';

function cacheKey(style: LabelStyle): string {
  return `${style.text}\u0000${style.font}\u0000${style.color}`;
}

export class LabelCache {
  private readonly entries = new Map<string, LabelSize>();
  private failureReported = false;

  /**
   * Measure a label, reusing a previous measurement when available.
   * Returns null when the surface reports unusable metrics; failures are not cached.
   */
  measure(surface: DrawSurface, style: LabelStyle): LabelSize | null {
    const key = cacheKey(style);
    const cached = this.entries.get(key);
    if (cached) return cached;

    surface.font = style.font;
    const metrics = surface.measureText(style.text);
    const ascent = metrics.actualBoundingBoxAscent;
    const descent = metrics.actualBoundingBoxDescent;
    if (!Number.isFinite(metrics.width) || !Number.isFinite(ascent) || !Number.isFinite(descent)) {
      return null;
    }

    const size: LabelSize = {
      width: Math.ceil(metrics.width),
      height: Math.ceil(ascent + descent),
      ascent,
    };
    this.entries.set(key, size);
    return size;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Log the first label failure; later ones skip silently */
  reportFailure(reason: unknown): void {
    if (this.failureReported) return;
    this.failureReported = true;
    console.warn('[Render] Label skipped:', reason);
  }
}

/**
 * Top-left corner of a label box centered in `rect` (integer division).
 */
export function centerLabel(rect: Rect, size: LabelSize): { x: number; y: number } {
  return {
    x: rect.x + Math.trunc((rect.w - size.width) / 2),
    y: rect.y + Math.trunc((rect.h - size.height) / 2),
  };
}

/**
 * Draw a label centered in `rect`. Returns false when the label was skipped
 * for this frame because it could not be measured or drawn.
 */
export function drawLabel(
  surface: DrawSurface,
  rect: Rect,
  style: LabelStyle,
  cache: LabelCache
): boolean {
  try {
    const size = cache.measure(surface, style);
    if (!size) {
      cache.reportFailure(new Error(`non-finite metrics for "${style.text}"`));
      return false;
    }

    const origin = centerLabel(rect, size);
    surface.font = style.font;
    surface.fillStyle = style.color;
    surface.textAlign = 'left';
    surface.textBaseline = 'alphabetic';
    surface.fillText(style.text, origin.x, origin.y + size.ascent);
    return true;
  } catch (err) {
    cache.reportFailure(err);
    return false;
  }
}
