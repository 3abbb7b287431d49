/**
 * Browser Platform
 *
 * Host services backed by the DOM: requestAnimationFrame for the frame loop,
 * a <canvas> as the window and its 2D context as the drawing surface, the CSS
 * Font Loading API for text, and Web Audio for sound.
 */

import type { Point, Size } from '@beepbutton/shared';
import type { AudioRequest, FontConfig, WindowConfig } from '@beepbutton/core';
import type { AudioSink } from '@beepbutton/synth';
import { WebAudioSink } from '../audio/webAudioSink.js';
import {
  EventQueue,
  pointerPosition,
  toPointerCancel,
  toPointerDown,
  toPointerMove,
  toPointerUp,
  type HostEvent,
} from '../interaction/events.js';
import type {
  AudioSubsystem,
  FontHandle,
  FrameScheduler,
  HostWindow,
  Platform,
  SurfaceHandle,
  TextSubsystem,
  VideoSubsystem,
} from './types.js';

// =============================================================================
// VIDEO
// =============================================================================

class AnimationFrameScheduler implements FrameScheduler, VideoSubsystem {
  private handle: number | null = null;

  get scheduler(): FrameScheduler {
    return this;
  }

  request(callback: () => void): void {
    this.cancel();
    this.handle = window.requestAnimationFrame(() => {
      this.handle = null;
      callback();
    });
  }

  cancel(): void {
    if (this.handle !== null) {
      window.cancelAnimationFrame(this.handle);
      this.handle = null;
    }
  }

  release(): void {
    this.cancel();
  }
}

// =============================================================================
// AUDIO
// =============================================================================

class WebAudioSubsystem implements AudioSubsystem {
  private readonly sinks = new Set<WebAudioSink>();

  openDevice(request: AudioRequest): AudioSink {
    const ctx = new AudioContext({
      sampleRate: request.sampleRate,
      latencyHint: request.bufferFrames / request.sampleRate,
    });
    try {
      const destination = ctx.destination;
      destination.channelCount = Math.min(request.channels, destination.maxChannelCount);
    } catch (err) {
      ctx.close().catch((closeErr: unknown) => {
        console.warn('[Audio] Failed to close audio context:', closeErr);
      });
      throw err;
    }
    const sink = new WebAudioSink(ctx);
    this.sinks.add(sink);
    return sink;
  }

  /** Close any device still open */
  release(): void {
    for (const sink of this.sinks) {
      sink.close();
    }
    this.sinks.clear();
  }
}

// =============================================================================
// TEXT
// =============================================================================

class FontRegistry implements TextSubsystem {
  private readonly faces = new Set<FontFace>();

  constructor(private readonly fonts: FontFaceSet) {}

  add(face: FontFace): void {
    this.fonts.add(face);
    this.faces.add(face);
  }

  remove(face: FontFace): void {
    if (!this.faces.delete(face)) return;
    this.fonts.delete(face);
  }

  release(): void {
    for (const face of [...this.faces]) {
      this.remove(face);
    }
  }
}

// =============================================================================
// WINDOW
// =============================================================================

class CanvasWindow implements HostWindow {
  private readonly events = new EventQueue();
  private readonly listeners = new AbortController();
  private lastPointer: Point | null = null;

  constructor(
    readonly canvas: HTMLCanvasElement,
    readonly title: string,
    private readonly ownsCanvas: boolean
  ) {
    const { signal } = this.listeners;

    canvas.addEventListener(
      'pointerdown',
      (event) => {
        // Keep receiving the matching pointerup even if it lands off the canvas
        canvas.setPointerCapture(event.pointerId);
        this.lastPointer = pointerPosition(event);
        this.events.push(toPointerDown(event));
      },
      { signal }
    );
    canvas.addEventListener(
      'pointerup',
      (event) => {
        this.lastPointer = pointerPosition(event);
        this.events.push(toPointerUp(event));
      },
      { signal }
    );
    canvas.addEventListener(
      'pointermove',
      (event) => {
        this.lastPointer = pointerPosition(event);
        this.events.push(toPointerMove(event));
      },
      { signal }
    );
    // A cancelled press never gets its pointerup
    const cancel = (event: PointerEvent) => {
      this.events.push(toPointerCancel(event));
    };
    canvas.addEventListener('pointercancel', cancel, { signal });
    canvas.addEventListener('lostpointercapture', cancel, { signal });
    canvas.addEventListener(
      'pointerleave',
      () => {
        this.lastPointer = null;
      },
      { signal }
    );
    window.addEventListener(
      'resize',
      () => {
        this.fitToViewport();
        this.events.push({ type: 'resize', ...this.size() });
      },
      { signal }
    );
    window.addEventListener(
      'pagehide',
      (event) => {
        // A page kept in the back/forward cache may be shown again
        if (!event.persisted) this.close();
      },
      { signal }
    );
  }

  size(): Size {
    return { width: this.canvas.width, height: this.canvas.height };
  }

  pointer(): Point | null {
    return this.lastPointer;
  }

  poll(): HostEvent[] {
    return this.events.drain();
  }

  close(): void {
    this.events.push({ type: 'quit' });
  }

  release(): void {
    this.listeners.abort();
    if (this.ownsCanvas) {
      this.canvas.remove();
    }
  }

  private fitToViewport(): void {
    this.canvas.width = window.innerWidth;
    this.canvas.height = window.innerHeight;
  }
}

// =============================================================================
// PLATFORM
// =============================================================================

/** Where the canvas lives; an Element satisfies it */
export interface CanvasRoot {
  querySelector(selectors: string): unknown;
  appendChild(node: HTMLCanvasElement): unknown;
}

export class BrowserPlatform implements Platform {
  private window: CanvasWindow | null = null;

  /**
   * @param root - element the canvas lives in; an existing `canvas#stage` inside it is reused
   */
  constructor(private readonly root: CanvasRoot) {}

  initVideo(): VideoSubsystem {
    if (typeof window === 'undefined' || typeof window.requestAnimationFrame !== 'function') {
      throw new Error('requestAnimationFrame is not available');
    }
    return new AnimationFrameScheduler();
  }

  initAudio(): AudioSubsystem {
    if (typeof AudioContext !== 'function') {
      throw new Error('Web Audio is not available');
    }
    return new WebAudioSubsystem();
  }

  initText(): TextSubsystem {
    if (typeof FontFace !== 'function' || !document.fonts) {
      throw new Error('CSS Font Loading API is not available');
    }
    return new FontRegistry(document.fonts);
  }

  createWindow(config: WindowConfig): HostWindow {
    const existing = this.root.querySelector('canvas#stage');
    const canvas = existing instanceof HTMLCanvasElement ? existing : document.createElement('canvas');
    canvas.id = 'stage';
    canvas.width = config.width;
    canvas.height = config.height;
    canvas.style.touchAction = 'none';
    if (canvas !== existing) {
      this.root.appendChild(canvas);
    }
    document.title = config.title;

    this.window = new CanvasWindow(canvas, config.title, canvas !== existing);
    return this.window;
  }

  createSurface(host: HostWindow): SurfaceHandle {
    if (!(host instanceof CanvasWindow)) {
      throw new Error('surface requires a canvas window');
    }
    const context = host.canvas.getContext('2d');
    if (!context) {
      throw new Error('2D canvas context is not available');
    }
    return {
      context,
      release: () => {
        context.clearRect(0, 0, host.canvas.width, host.canvas.height);
      },
    };
  }

  async loadFont(text: TextSubsystem, config: FontConfig): Promise<FontHandle> {
    if (!(text instanceof FontRegistry)) {
      throw new Error('font loading requires the browser text subsystem');
    }
    const face = new FontFace(config.family, `url("${config.source}")`);
    await face.load();
    text.add(face);
    return {
      family: config.family,
      size: config.size,
      css: `${config.size}px "${config.family}"`,
      release: () => text.remove(face),
    };
  }

  /** Ask the running app to quit at its next frame */
  requestQuit(): void {
    this.window?.close();
  }
}
