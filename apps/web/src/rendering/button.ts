/**
 * Button Rendering
 *
 * Draws the button fill, inner border, and centered label.
 */

import type { Button } from '@beepbutton/core';
import { BORDER_WIDTH, BUTTON_BORDER, BUTTON_FILL, PHASE_VISUAL } from '../constants.js';
import { fillRect, strokeRectInside } from './primitives.js';
import { drawLabel, type LabelCache } from './label.js';
import type { ButtonColors, DrawSurface, LabelStyle } from './types.js';

/**
 * Resolve fill and border colors by priority: pressed > hover > idle
 */
export function buttonColors(button: Button): ButtonColors {
  const visual = PHASE_VISUAL[button.phase];
  return { fill: BUTTON_FILL[visual], border: BUTTON_BORDER[visual] };
}

/**
 * Draw the button. Returns false if the label was skipped this frame.
 */
export function drawButton(
  surface: DrawSurface,
  button: Button,
  label: LabelStyle,
  cache: LabelCache
): boolean {
  const colors = buttonColors(button);
  fillRect(surface, button.rect, colors.fill);
  strokeRectInside(surface, button.rect, colors.border, BORDER_WIDTH);
  return drawLabel(surface, button.rect, label, cache);
}
