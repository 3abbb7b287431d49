/**
 * Beep Button web entry
 *
 * Exports:
 *  - init(container?, options?) -> { done, destroy() }
 *
 * Loaded as a module script, it starts itself inside document.body.
 */

import type { AppConfigInput } from '@beepbutton/core';
import type { RandomSource } from '@beepbutton/shared';
import { runApplication } from './bootstrap.js';
import { EXIT_SUCCESS, type ExitCode } from './constants.js';
import { BrowserPlatform } from './platform/browser.js';

export type InitOptions = {
  config?: AppConfigInput;
  random?: RandomSource;
};

export type AppInstance = {
  /** Resolves with the exit code once the app has quit and released its resources */
  done: Promise<ExitCode>;
  /** Request a quit; takes effect on the next frame */
  destroy(): void;
};

/**
 * Start the app inside a container element (or selector).
 *
 * @param container - Element or selector (defaults to document.body)
 */
export function init(container: Element | string = document.body, options: InitOptions = {}): AppInstance {
  const root = typeof container === 'string' ? document.querySelector(container) : container;
  if (!root) {
    throw new Error('Container element not found for beep-button init()');
  }

  const platform = new BrowserPlatform(root);
  const done = runApplication(platform, options.config, options.random);
  return {
    done,
    destroy: () => platform.requestQuit(),
  };
}

if (typeof document !== 'undefined') {
  init()
    .done.then((code) => {
      if (code !== EXIT_SUCCESS) {
        console.error(`[App] Exited with status ${code}`);
      }
    })
    .catch((err: unknown) => {
      console.error('[App] Crashed:', err);
    });
}
