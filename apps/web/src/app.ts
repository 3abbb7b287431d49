/**
 * Button App
 *
 * Owns the button and background state and runs one frame at a time:
 * poll tick, drain host events, render. All state changes happen
 * synchronously inside `frame()`.
 */

import {
  createButton,
  pointerCancelled,
  pointerMoved,
  pointerPressed,
  pointerReleased,
  randomBackground,
  relayout,
  type AppConfig,
  type Button,
} from '@beepbutton/core';
import type { RandomSource, Rgb } from '@beepbutton/shared';
import { playTone, type AudioSink } from '@beepbutton/synth';
import { EXIT_SUCCESS, LABEL_COLOR, type ExitCode } from './constants.js';
import type { HostEvent } from './interaction/events.js';
import type { FontHandle, FrameScheduler, HostWindow } from './platform/types.js';
import { LabelCache, renderFrame, type DrawSurface, type LabelStyle } from './rendering/index.js';
import { colorToCss } from './utils/colors.js';

export interface AppServices {
  window: HostWindow;
  surface: DrawSurface;
  font: FontHandle;
  /** Null when no audio device could be opened; beeps are then skipped */
  audio: AudioSink | null;
}

export class ButtonApp {
  private button: Button;
  private background: Rgb;
  private running = true;
  private clicks = 0;
  private readonly label: LabelStyle;
  private readonly labels = new LabelCache();

  constructor(
    private readonly services: AppServices,
    private readonly config: AppConfig,
    private readonly random: RandomSource = Math.random
  ) {
    this.button = createButton(services.window.size(), {
      width: config.button.width,
      height: config.button.height,
    });
    this.background = { ...config.background.initial };
    this.label = {
      text: config.button.label,
      font: services.font.css,
      color: colorToCss(LABEL_COLOR),
    };
  }

  // ===========================================================================
  // STATE ACCESS
  // ===========================================================================

  get currentButton(): Button {
    return this.button;
  }

  get currentBackground(): Rgb {
    return { ...this.background };
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Confirmed clicks so far */
  get clickCount(): number {
    return this.clicks;
  }

  // ===========================================================================
  // FRAME
  // ===========================================================================

  frame(): void {
    // Poll tick: hover follows the live pointer even without a move event
    this.button = pointerMoved(this.button, this.services.window.pointer());

    for (const event of this.services.window.poll()) {
      this.handleEvent(event);
    }

    renderFrame(
      this.services.surface,
      {
        size: this.services.window.size(),
        background: this.background,
        button: this.button,
        label: this.label,
      },
      this.labels
    );
  }

  handleEvent(event: HostEvent): void {
    switch (event.type) {
      case 'quit':
        this.running = false;
        break;
      case 'resize':
        this.button = relayout(this.button, this.services.window.size());
        break;
      case 'pointer-down':
        if (event.button !== 'left') break;
        this.button = pointerPressed(this.button, event);
        break;
      case 'pointer-up': {
        if (event.button !== 'left') break;
        const result = pointerReleased(this.button, event);
        this.button = result.button;
        if (result.clicked) this.confirmClick();
        break;
      }
      case 'pointer-move':
        this.button = pointerMoved(this.button, event);
        break;
      case 'pointer-cancel':
        this.button = pointerCancelled(this.button, event);
        break;
    }
  }

  /**
   * Confirmed click: new background first, then the beep. A failing beep
   * leaves the color change and button state in place.
   */
  private confirmClick(): void {
    this.clicks++;
    this.background = randomBackground(this.random, this.config.background);
    try {
      playTone(this.services.audio, this.config.tone);
    } catch (err) {
      console.warn('[Audio] Beep failed:', err);
    }
  }
}

/**
 * Run frames until the app stops. Resolves with the exit code; rejects if a
 * frame throws.
 */
export function runLoop(app: ButtonApp, scheduler: FrameScheduler): Promise<ExitCode> {
  return new Promise((resolve, reject) => {
    const tick = () => {
      try {
        app.frame();
      } catch (err) {
        reject(err);
        return;
      }
      if (app.isRunning) {
        scheduler.request(tick);
      } else {
        resolve(EXIT_SUCCESS);
      }
    };
    scheduler.request(tick);
  });
}
