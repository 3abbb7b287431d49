/**
 * Bootstrap
 *
 * Acquires host services stage by stage, runs the frame loop, and releases
 * everything on the way out. Startup stages:
 *
 *   config -> video -> audio -> text -> window -> surface -> font -> audio-device
 *
 * Every stage but `audio-device` is fatal: what was acquired so far is released
 * and the run ends with EXIT_FAILURE. A device that cannot be opened only
 * disables beeps.
 */

import { parseAppConfig, type AppConfig, type AppConfigInput } from '@beepbutton/core';
import type { RandomSource } from '@beepbutton/shared';
import type { AudioSink } from '@beepbutton/synth';
import { ButtonApp, runLoop } from './app.js';
import { EXIT_FAILURE, type ExitCode } from './constants.js';
import { ResourceScope } from './resources.js';
import type {
  AudioSubsystem,
  FontHandle,
  HostWindow,
  Platform,
  SurfaceHandle,
  TextSubsystem,
  VideoSubsystem,
} from './platform/types.js';

// =============================================================================
// ERRORS
// =============================================================================

export type StartupStage =
  | 'config'
  | 'video'
  | 'audio'
  | 'text'
  | 'window'
  | 'surface'
  | 'font'
  | 'audio-device';

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** A startup stage failed; `cause` holds the platform error */
export class StartupError extends Error {
  constructor(
    public readonly stage: StartupStage,
    cause: unknown
  ) {
    super(`${stage} initialization failed: ${describeError(cause)}`, { cause });
    this.name = 'StartupError';
  }
}

// =============================================================================
// STARTUP
// =============================================================================

export interface Services {
  video: VideoSubsystem;
  audioSubsystem: AudioSubsystem;
  text: TextSubsystem;
  window: HostWindow;
  surface: SurfaceHandle;
  font: FontHandle;
  audio: AudioSink | null;
}

async function acquire<T>(
  scope: ResourceScope,
  stage: StartupStage,
  open: () => T | Promise<T>,
  release: (resource: T) => void
): Promise<T> {
  let resource: T;
  try {
    resource = await open();
  } catch (err) {
    scope.releaseAll();
    throw new StartupError(stage, err);
  }
  return scope.adopt(stage, resource, release);
}

function openDevice(subsystem: AudioSubsystem, config: AppConfig, scope: ResourceScope): AudioSink | null {
  let sink: AudioSink;
  try {
    sink = subsystem.openDevice(config.audio);
  } catch (err) {
    console.warn(`[Audio] audio device unavailable: ${describeError(err)}; continuing without sound`);
    return null;
  }
  return scope.adopt('audio-device', sink, (s) => s.close());
}

/**
 * Acquire every service in order. On failure, everything already acquired is
 * released before the StartupError propagates.
 */
export async function startup(platform: Platform, config: AppConfig, scope: ResourceScope): Promise<Services> {
  const video = await acquire(scope, 'video', () => platform.initVideo(), (v) => v.release());
  const audioSubsystem = await acquire(scope, 'audio', () => platform.initAudio(), (a) => a.release());
  const text = await acquire(scope, 'text', () => platform.initText(), (t) => t.release());
  const window = await acquire(scope, 'window', () => platform.createWindow(config.window), (w) => w.release());
  const surface = await acquire(scope, 'surface', () => platform.createSurface(window), (s) => s.release());
  const font = await acquire(scope, 'font', () => platform.loadFont(text, config.font), (f) => f.release());
  const audio = openDevice(audioSubsystem, config, scope);
  return { video, audioSubsystem, text, window, surface, font, audio };
}

// =============================================================================
// RUN
// =============================================================================

function resolveConfig(input: AppConfigInput | undefined): AppConfig {
  try {
    return parseAppConfig(input ?? {});
  } catch (err) {
    throw new StartupError('config', err);
  }
}

/**
 * Start the app on a platform and run it to completion.
 * Resolves with EXIT_SUCCESS after a normal quit and EXIT_FAILURE when startup fails.
 */
export async function runApplication(
  platform: Platform,
  input?: AppConfigInput,
  random?: RandomSource
): Promise<ExitCode> {
  const scope = new ResourceScope();
  let config: AppConfig;
  let services: Services;
  try {
    config = resolveConfig(input);
    services = await startup(platform, config, scope);
  } catch (err) {
    if (err instanceof StartupError) {
      console.error(`[Startup] ${err.message}`);
      return EXIT_FAILURE;
    }
    throw err;
  }

  try {
    const app = new ButtonApp(
      {
        window: services.window,
        surface: services.surface.context,
        font: services.font,
        audio: services.audio,
      },
      config,
      random
    );
    return await runLoop(app, services.video.scheduler);
  } finally {
    scope.releaseAll();
  }
}
