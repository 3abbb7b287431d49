/**
 * Rendering Types
 *
 * Type definitions for canvas rendering functions.
 */

import type { Rgb, Size } from '@beepbutton/shared';
import type { Button } from '@beepbutton/core';

/**
 * Text measurement fields the label layout reads
 */
export type LabelMetrics = {
  width: number;
  actualBoundingBoxAscent: number;
  actualBoundingBoxDescent: number;
};

/**
 * The part of CanvasRenderingContext2D the renderer draws with.
 * A real 2D context satisfies it; tests pass a recording fake.
 */
export interface DrawSurface {
  fillStyle: string | CanvasGradient | CanvasPattern;
  strokeStyle: string | CanvasGradient | CanvasPattern;
  lineWidth: number;
  font: string;
  textAlign: CanvasTextAlign;
  textBaseline: CanvasTextBaseline;
  fillRect(x: number, y: number, w: number, h: number): void;
  strokeRect(x: number, y: number, w: number, h: number): void;
  fillText(text: string, x: number, y: number): void;
  measureText(text: string): LabelMetrics;
}

/**
 * Label rendering options
 */
export type LabelStyle = {
  text: string;
  /** CSS font shorthand */
  font: string;
  /** CSS color */
  color: string;
};

/**
 * Measured label box in whole pixels
 */
export type LabelSize = {
  width: number;
  height: number;
  ascent: number;
};

/**
 * Fill and border colors for one button phase
 */
export type ButtonColors = {
  fill: Rgb;
  border: Rgb;
};

/**
 * Everything drawn in one frame
 */
export type FrameScene = {
  size: Size;
  background: Rgb;
  button: Button;
  label: LabelStyle;
};
