/**
 * Audio format and sink contracts
 */

/** Output format negotiated with the audio device */
export interface AudioFormat {
  /** Frames per second (Hz) */
  sampleRate: number;
  /** Interleaved channels per frame */
  channels: number;
}

/**
 * Interleaved 32-bit float samples. `samples.length === frames * channels`.
 */
export interface ToneBuffer {
  samples: Float32Array;
  frames: number;
  channels: number;
  sampleRate: number;
}

export interface ToneOptions {
  /** Tone frequency (Hz) */
  frequency?: number;
  /** Tone length (s) */
  durationSeconds?: number;
  /** Peak amplitude, 0..1 */
  amplitude?: number;
}

/**
 * Playback queue owned by the audio output. Producers only append:
 * enqueue never blocks, returns no handle, and cannot be cancelled.
 */
export interface AudioSink {
  readonly format: AudioFormat;
  enqueue(buffer: ToneBuffer): void;
  close(): void;
}
