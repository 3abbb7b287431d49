/**
 * App Config Schema - Beep Button
 * Runtime validation with Zod + TypeScript types
 */

import { z } from 'zod';
import {
  AUDIO_BUFFER_FRAMES,
  AUDIO_CHANNELS,
  AUDIO_SAMPLE_RATE,
  BACKGROUND_CHANNEL_MAX,
  BACKGROUND_CHANNEL_MIN,
  BUTTON_HEIGHT,
  BUTTON_LABEL,
  BUTTON_WIDTH,
  DEFAULT_TONE_DURATION,
  DEFAULT_TONE_FREQUENCY,
  FONT_FAMILY,
  FONT_SIZE,
  FONT_SOURCE,
  INITIAL_BACKGROUND,
  TONE_AMPLITUDE,
  WINDOW_HEIGHT,
  WINDOW_TITLE,
  WINDOW_WIDTH,
} from '@beepbutton/shared';

// ============================================================================
// Base Schemas
// ============================================================================

const Channel = z.number().int().min(0).max(255);

/** 8-bit RGB color schema */
export const RgbSchema = z.object({
  r: Channel,
  g: Channel,
  b: Channel,
});

const PixelLength = z.number().int().positive();

// ============================================================================
// Section Schemas
// ============================================================================

export const WindowConfigSchema = z.object({
  title: z.string().default(WINDOW_TITLE),
  width: PixelLength.default(WINDOW_WIDTH),
  height: PixelLength.default(WINDOW_HEIGHT),
});

export const ButtonConfigSchema = z.object({
  width: PixelLength.default(BUTTON_WIDTH),
  height: PixelLength.default(BUTTON_HEIGHT),
  label: z.string().min(1).default(BUTTON_LABEL),
});

export const FontConfigSchema = z.object({
  family: z.string().min(1).default(FONT_FAMILY),
  source: z.string().min(1).default(FONT_SOURCE),
  size: z.number().positive().default(FONT_SIZE),
});

/**
 * Audio device request. The platform may negotiate a different format;
 * synthesis always follows the negotiated one.
 */
export const AudioRequestSchema = z.object({
  sampleRate: z.number().int().positive().default(AUDIO_SAMPLE_RATE),
  channels: z.number().int().min(1).max(32).default(AUDIO_CHANNELS),
  bufferFrames: z.number().int().positive().default(AUDIO_BUFFER_FRAMES),
});

export const ToneConfigSchema = z.object({
  frequency: z.number().positive().default(DEFAULT_TONE_FREQUENCY),
  durationSeconds: z.number().positive().default(DEFAULT_TONE_DURATION),
  amplitude: z.number().min(0).max(1).default(TONE_AMPLITUDE),
});

export const BackgroundConfigSchema = z
  .object({
    initial: RgbSchema.default({ ...INITIAL_BACKGROUND }),
    min: Channel.default(BACKGROUND_CHANNEL_MIN),
    max: Channel.default(BACKGROUND_CHANNEL_MAX),
  })
  .refine((bg) => bg.min <= bg.max, {
    message: 'background.min must not exceed background.max',
    path: ['min'],
  });

// ============================================================================
// App Config
// ============================================================================

export const AppConfigSchema = z.object({
  window: WindowConfigSchema.default({}),
  button: ButtonConfigSchema.default({}),
  font: FontConfigSchema.default({}),
  audio: AudioRequestSchema.default({}),
  tone: ToneConfigSchema.default({}),
  background: BackgroundConfigSchema.default({}),
});

export type RgbConfig = z.infer<typeof RgbSchema>;
export type WindowConfig = z.infer<typeof WindowConfigSchema>;
export type ButtonConfig = z.infer<typeof ButtonConfigSchema>;
export type FontConfig = z.infer<typeof FontConfigSchema>;
export type AudioRequest = z.infer<typeof AudioRequestSchema>;
export type ToneConfig = z.infer<typeof ToneConfigSchema>;
export type BackgroundConfig = z.infer<typeof BackgroundConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Partial config accepted from callers before defaults are applied */
export type AppConfigInput = z.input<typeof AppConfigSchema>;

/**
 * Validate a config object, filling every missing field with its default.
 * Throws ZodError on invalid input.
 */
export function parseAppConfig(input: unknown = {}): AppConfig {
  return AppConfigSchema.parse(input);
}

export function getDefaultAppConfig(): AppConfig {
  return AppConfigSchema.parse({});
}
