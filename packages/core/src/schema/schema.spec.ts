import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { getDefaultAppConfig, parseAppConfig } from './index.js';

describe('AppConfig schema', () => {
  it('fills every default', () => {
    const config = getDefaultAppConfig();
    expect(config.window).toEqual({ title: 'Beep Button', width: 900, height: 600 });
    expect(config.button).toEqual({ width: 200, height: 60, label: 'Click me!' });
    expect(config.font).toEqual({
      family: 'Motiva Sans',
      source: './assets/fonts/MotivaSansBold.woff.ttf',
      size: 28,
    });
    expect(config.audio).toEqual({ sampleRate: 48000, channels: 2, bufferFrames: 1024 });
    expect(config.tone).toEqual({ frequency: 880, durationSeconds: 0.12, amplitude: 0.25 });
    expect(config.background).toEqual({ initial: { r: 20, g: 24, b: 28 }, min: 40, max: 220 });
  });

  it('merges partial overrides with defaults', () => {
    const config = parseAppConfig({ tone: { frequency: 440 }, window: { title: 'Test' } });
    expect(config.tone).toEqual({ frequency: 440, durationSeconds: 0.12, amplitude: 0.25 });
    expect(config.window).toEqual({ title: 'Test', width: 900, height: 600 });
  });

  it('rejects non-integer pixel sizes', () => {
    expect(() => parseAppConfig({ button: { width: 10.5 } })).toThrow(ZodError);
  });

  it('rejects out-of-range color channels', () => {
    expect(() => parseAppConfig({ background: { initial: { r: 256, g: 0, b: 0 } } })).toThrow(ZodError);
  });

  it('rejects an inverted background range', () => {
    expect(() => parseAppConfig({ background: { min: 200, max: 100 } })).toThrow(
      'background.min must not exceed background.max'
    );
  });

  it('rejects a non-object config', () => {
    expect(() => parseAppConfig('loud')).toThrow(ZodError);
  });
});
