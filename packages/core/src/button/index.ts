/**
 * Button State Machine
 *
 * Pointer-driven states for a single push button. The phase is a tagged value
 * instead of independent hovered/pressed/activePress flags:
 *
 *   idle            pointer outside, no press in progress
 *   hover           pointer inside, no press in progress
 *   active-outside  press began inside, pointer has since left
 *   pressed         press began inside, pointer is inside
 *
 * A press is only "active" between a left-button down that landed inside the
 * rect and the following release, so `pressed` always implies the mouse is down.
 * All transitions are pure and return a new Button.
 */

import { BUTTON_HEIGHT, BUTTON_WIDTH, centerRect, pointInRect } from '@beepbutton/shared';
import type { Point, Rect, Size } from '@beepbutton/shared';

// =============================================================================
// TYPES
// =============================================================================

export type ButtonPhase = 'idle' | 'hover' | 'active-outside' | 'pressed';

export interface Button {
  rect: Rect;
  phase: ButtonPhase;
}

export interface ReleaseResult {
  button: Button;
  /** True when the press began inside and the release landed inside */
  clicked: boolean;
}

const DEFAULT_BUTTON_SIZE: Size = { width: BUTTON_WIDTH, height: BUTTON_HEIGHT };

// =============================================================================
// CONSTRUCTION / LAYOUT
// =============================================================================

/**
 * Create an idle button centered in the window.
 */
export function createButton(window: Size, size: Size = DEFAULT_BUTTON_SIZE): Button {
  return { rect: centerRect(window, size), phase: 'idle' };
}

/**
 * Recenter the button for a new window size. Width, height and phase are kept.
 */
export function relayout(button: Button, window: Size): Button {
  const size = { width: button.rect.w, height: button.rect.h };
  return { rect: centerRect(window, size), phase: button.phase };
}

// =============================================================================
// DERIVED FLAGS
// =============================================================================

export function isHovered(button: Button): boolean {
  return button.phase === 'hover' || button.phase === 'pressed';
}

export function isPressed(button: Button): boolean {
  return button.phase === 'pressed';
}

/** Press began inside the rect and has not been released yet */
export function isActivePress(button: Button): boolean {
  return button.phase === 'active-outside' || button.phase === 'pressed';
}

// =============================================================================
// TRANSITIONS
// =============================================================================

function hitTest(button: Button, point: Point | null): boolean {
  return point !== null && pointInRect(point, button.rect);
}

/**
 * Pointer moved (or per-frame poll tick). A null point means the pointer is
 * not over the surface.
 */
export function pointerMoved(button: Button, point: Point | null): Button {
  const inside = hitTest(button, point);
  let phase: ButtonPhase;
  if (isActivePress(button)) {
    phase = inside ? 'pressed' : 'active-outside';
  } else {
    phase = inside ? 'hover' : 'idle';
  }
  return phase === button.phase ? button : { rect: button.rect, phase };
}

/**
 * Left button went down. Only a press that lands inside engages the click sequence.
 */
export function pointerPressed(button: Button, point: Point): Button {
  const phase: ButtonPhase = hitTest(button, point) ? 'pressed' : 'idle';
  return { rect: button.rect, phase };
}

/**
 * Left button went up. Reports a confirmed click and always clears the press.
 */
export function pointerReleased(button: Button, point: Point): ReleaseResult {
  const inside = hitTest(button, point);
  return {
    button: { rect: button.rect, phase: inside ? 'hover' : 'idle' },
    clicked: isActivePress(button) && inside,
  };
}

/**
 * The host abandoned the press (pointer cancel or lost capture). Clears an
 * active press without a click; a button with no press in progress is returned
 * unchanged.
 */
export function pointerCancelled(button: Button, point: Point | null): Button {
  if (!isActivePress(button)) return button;
  return { rect: button.rect, phase: hitTest(button, point) ? 'hover' : 'idle' };
}
