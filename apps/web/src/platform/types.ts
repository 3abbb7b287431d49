/**
 * Platform Types
 *
 * Service handles the application acquires at startup. Every handle is
 * explicitly released; nothing here is ambient global state.
 */

import type { Point, Size } from '@beepbutton/shared';
import type { AudioRequest, FontConfig, WindowConfig } from '@beepbutton/core';
import type { AudioSink } from '@beepbutton/synth';
import type { HostEvent } from '../interaction/events.js';
import type { DrawSurface } from '../rendering/types.js';

/** Anything acquired at startup and released at shutdown */
export interface Releasable {
  release(): void;
}

/**
 * Drives the frame loop. One pending callback at a time.
 */
export interface FrameScheduler {
  request(callback: () => void): void;
  cancel(): void;
}

export interface VideoSubsystem extends Releasable {
  readonly scheduler: FrameScheduler;
}

/**
 * Audio output support. Acquiring it is fatal when it fails; opening a device
 * through it is not.
 */
export interface AudioSubsystem extends Releasable {
  /** Open an output device close to `request`; throws when none can be opened */
  openDevice(request: AudioRequest): AudioSink;
}

export type TextSubsystem = Releasable;

export interface HostWindow extends Releasable {
  readonly title: string;
  /** Current drawable size in pixels */
  size(): Size;
  /** Last known pointer position, or null when the pointer is not over the window */
  pointer(): Point | null;
  /** Hand out all events queued since the previous poll */
  poll(): HostEvent[];
  /** Queue a quit request */
  close(): void;
}

export interface SurfaceHandle extends Releasable {
  readonly context: DrawSurface;
}

export interface FontHandle extends Releasable {
  readonly family: string;
  readonly size: number;
  /** CSS font shorthand, e.g. `28px "Motiva Sans"` */
  readonly css: string;
}

/**
 * Host services in startup order. Any method may throw (or reject) to signal
 * that its stage failed.
 */
export interface Platform {
  initVideo(): VideoSubsystem;
  initAudio(): AudioSubsystem;
  initText(): TextSubsystem;
  createWindow(config: WindowConfig): HostWindow;
  createSurface(window: HostWindow): SurfaceHandle;
  loadFont(text: TextSubsystem, config: FontConfig): Promise<FontHandle>;
}
