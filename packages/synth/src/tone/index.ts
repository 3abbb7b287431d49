/**
 * Sine tone synthesis
 *
 * Continuous-phase sine with a fixed attenuation and no envelope. Because the
 * wave is cut at arbitrary phase, playback has an audible click at both ends.
 */

import { DEFAULT_TONE_DURATION, DEFAULT_TONE_FREQUENCY, TONE_AMPLITUDE } from '@beepbutton/shared';
import type { AudioFormat, AudioSink, ToneBuffer, ToneOptions } from '../types.js';

function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive finite number, got ${value}`);
  }
}

/**
 * Number of frames a tone of the given length occupies (truncated).
 */
export function toneFrameCount(durationSeconds: number, sampleRate: number): number {
  return Math.trunc(durationSeconds * sampleRate);
}

/**
 * Render a mono sine into an interleaved buffer for the given output format.
 * Every channel of a frame carries the same sample.
 */
export function synthesizeTone(format: AudioFormat, options: ToneOptions = {}): ToneBuffer {
  const frequency = options.frequency ?? DEFAULT_TONE_FREQUENCY;
  const durationSeconds = options.durationSeconds ?? DEFAULT_TONE_DURATION;
  const amplitude = options.amplitude ?? TONE_AMPLITUDE;
  const { sampleRate, channels } = format;

  assertPositive('frequency', frequency);
  assertPositive('durationSeconds', durationSeconds);
  assertPositive('sampleRate', sampleRate);
  if (!Number.isInteger(channels) || channels < 1) {
    throw new RangeError(`channels must be a positive integer, got ${channels}`);
  }

  const frames = toneFrameCount(durationSeconds, sampleRate);
  const samples = new Float32Array(frames * channels);
  const increment = (2 * Math.PI * frequency) / sampleRate;

  let phase = 0;
  for (let i = 0; i < frames; i++) {
    const sample = Math.sin(phase) * amplitude;
    phase += increment;
    const offset = i * channels;
    for (let c = 0; c < channels; c++) {
      samples[offset + c] = sample;
    }
  }

  return { samples, frames, channels, sampleRate };
}

/**
 * Synthesize a tone in the sink's negotiated format and queue it.
 * Without a sink this is a no-op.
 */
export function playTone(sink: AudioSink | null, options: ToneOptions = {}): void {
  if (!sink) return;
  sink.enqueue(synthesizeTone(sink.format, options));
}
