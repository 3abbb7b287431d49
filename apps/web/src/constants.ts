/**
 * Application constants for the Beep Button web app
 * Drawing colors and log scopes
 */

import type { Rgb } from '@beepbutton/shared';
import type { ButtonPhase } from '@beepbutton/core';
import { gray } from './utils/colors.js';

// =============================================================================
// BUTTON COLORS
// =============================================================================

/** What the button looks like; drawn by priority pressed > hover > idle */
export type VisualState = 'idle' | 'hover' | 'pressed';

/** Button fill per visual state (pressed is darkest) */
export const BUTTON_FILL: Record<VisualState, Rgb> = {
  idle: gray(40),
  hover: gray(70),
  pressed: gray(30),
};

/** Button border per visual state (lighter when hovered/pressed) */
export const BUTTON_BORDER: Record<VisualState, Rgb> = {
  idle: gray(200),
  hover: gray(215),
  pressed: gray(235),
};

/** Label text color */
export const LABEL_COLOR: Rgb = gray(255);

/** Border stroke width (px) */
export const BORDER_WIDTH = 1;

/**
 * Visual state drawn for each machine phase. A press that has left the
 * button is drawn as plain idle.
 */
export const PHASE_VISUAL: Record<ButtonPhase, VisualState> = {
  idle: 'idle',
  hover: 'hover',
  'active-outside': 'idle',
  pressed: 'pressed',
};

// =============================================================================
// EXIT CODES
// =============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export type ExitCode = typeof EXIT_SUCCESS | typeof EXIT_FAILURE;
