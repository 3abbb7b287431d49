/**
 * Application constants
 */

import type { Rgb } from '../types/index.js';

// ============================================================================
// Window
// ============================================================================

/** Window title */
export const WINDOW_TITLE = 'Beep Button';

/** Initial window width (px) */
export const WINDOW_WIDTH = 900;

/** Initial window height (px) */
export const WINDOW_HEIGHT = 600;

// ============================================================================
// Button
// ============================================================================

/** Fixed button width (px) */
export const BUTTON_WIDTH = 200;

/** Fixed button height (px) */
export const BUTTON_HEIGHT = 60;

/** Button label text */
export const BUTTON_LABEL = 'Click me!';

// ============================================================================
// Font
// ============================================================================

/** Label font file, relative to the page */
export const FONT_SOURCE = './assets/fonts/MotivaSansBold.woff.ttf';

/** CSS family name the label font is registered under */
export const FONT_FAMILY = 'Motiva Sans';

/** Label font size (px) */
export const FONT_SIZE = 28;

// ============================================================================
// Background
// ============================================================================

/** Background color before the first click (dark gray) */
export const INITIAL_BACKGROUND: Readonly<Rgb> = { r: 20, g: 24, b: 28 };

/** Lowest value a randomized background channel can take */
export const BACKGROUND_CHANNEL_MIN = 40;

/** Highest value a randomized background channel can take */
export const BACKGROUND_CHANNEL_MAX = 220;

// ============================================================================
// Audio
// ============================================================================

/** Requested output sample rate (Hz) */
export const AUDIO_SAMPLE_RATE = 48000;

/** Requested output channel count */
export const AUDIO_CHANNELS = 2;

/** Requested device buffer size (frames) */
export const AUDIO_BUFFER_FRAMES = 1024;

/** Default beep frequency (Hz) */
export const DEFAULT_TONE_FREQUENCY = 880;

/** Default beep duration (s) */
export const DEFAULT_TONE_DURATION = 0.12;

/** Fixed attenuation applied to the sine wave */
export const TONE_AMPLITUDE = 0.25;
