/**
 * Rendering Module Barrel Exports
 *
 * Re-exports all rendering functionality from a single entry point.
 */

// Types
export {
  type DrawSurface,
  type LabelMetrics,
  type LabelStyle,
  type LabelSize,
  type ButtonColors,
  type FrameScene,
} from './types.js';

// Primitives
export { clearSurface, fillRect, strokeRectInside } from './primitives.js';

// Label
export { LabelCache, centerLabel, drawLabel } from './label.js';

// Button
export { buttonColors, drawButton } from './button.js';

// Frame
export { type FrameResult, renderFrame } from './frame.js';
