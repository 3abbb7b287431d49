/**
 * Frame Rendering
 *
 * Composes one full frame: background, then the button on top.
 * The canvas presents the result when the animation frame callback returns.
 */

import { clearSurface } from './primitives.js';
import { drawButton } from './button.js';
import type { LabelCache } from './label.js';
import type { DrawSurface, FrameScene } from './types.js';

export type FrameResult = {
  labelDrawn: boolean;
};

export function renderFrame(surface: DrawSurface, scene: FrameScene, cache: LabelCache): FrameResult {
  clearSurface(surface, scene.size, scene.background);
  const labelDrawn = drawButton(surface, scene.button, scene.label, cache);
  return { labelDrawn };
}
