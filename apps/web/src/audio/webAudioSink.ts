/**
 * Web Audio Sink
 *
 * Plays queued tone buffers back to back on an AudioContext. Each buffer is
 * scheduled at the end of the queue (or now, if the queue has drained), so
 * beeps never overlap and the producer never waits.
 */

import type { AudioFormat, AudioSink, ToneBuffer } from '@beepbutton/synth';

// =============================================================================
// WEB AUDIO SUBSET
// =============================================================================

export interface AudioNodeLike {
  readonly channelCount: number;
}

export interface AudioBufferLike {
  readonly numberOfChannels: number;
  readonly length: number;
  copyToChannel(source: Float32Array, channelNumber: number): void;
}

export interface AudioBufferSourceLike {
  buffer: AudioBufferLike | null;
  connect(destination: AudioNodeLike): unknown;
  start(when?: number): void;
}

/**
 * The part of AudioContext the sink uses
 */
export interface AudioContextLike {
  readonly sampleRate: number;
  readonly currentTime: number;
  readonly state: string;
  readonly destination: AudioNodeLike;
  createBuffer(numberOfChannels: number, length: number, sampleRate: number): AudioBufferLike;
  createBufferSource(): AudioBufferSourceLike;
  resume(): Promise<void>;
  close(): Promise<void>;
}

// =============================================================================
// SINK
// =============================================================================

export class WebAudioSink implements AudioSink {
  readonly format: AudioFormat;
  private queueEnd = 0;
  private closed = false;

  constructor(private readonly ctx: AudioContextLike) {
    this.format = { sampleRate: ctx.sampleRate, channels: ctx.destination.channelCount };
  }

  /** Context time (s) at which the last queued buffer finishes */
  get queuedUntil(): number {
    return this.queueEnd;
  }

  enqueue(buffer: ToneBuffer): void {
    if (this.closed || buffer.frames === 0) return;

    // Contexts start suspended until the page has seen a user gesture
    if (this.ctx.state === 'suspended') {
      this.ctx.resume().catch((err: unknown) => {
        console.warn('[Audio] Failed to resume audio context:', err);
      });
    }

    const audioBuffer = this.ctx.createBuffer(buffer.channels, buffer.frames, buffer.sampleRate);
    const plane = new Float32Array(buffer.frames);
    for (let c = 0; c < buffer.channels; c++) {
      for (let i = 0; i < buffer.frames; i++) {
        plane[i] = buffer.samples[i * buffer.channels + c];
      }
      audioBuffer.copyToChannel(plane, c);
    }

    const source = this.ctx.createBufferSource();
    source.buffer = audioBuffer;
    source.connect(this.ctx.destination);

    const startAt = Math.max(this.ctx.currentTime, this.queueEnd);
    source.start(startAt);
    this.queueEnd = startAt + buffer.frames / buffer.sampleRate;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.ctx.close().catch((err: unknown) => {
      console.warn('[Audio] Failed to close audio context:', err);
    });
  }
}
