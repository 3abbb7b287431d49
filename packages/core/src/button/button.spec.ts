/**
 * Unit tests for the button state machine
 * Tests hover tracking, press latching, confirmed clicks, and relayout
 */

import { describe, it, expect } from 'vitest';
import {
  createButton,
  relayout,
  pointerMoved,
  pointerPressed,
  pointerReleased,
  pointerCancelled,
  isHovered,
  isPressed,
  isActivePress,
  type Button,
} from './index.js';

const WINDOW = { width: 900, height: 600 };

// Button rect for the initial window is { x: 350, y: 270, w: 200, h: 60 }
const INSIDE = { x: 450, y: 300 };
const OUTSIDE = { x: 10, y: 10 };

function press(button: Button, at = INSIDE): Button {
  return pointerPressed(pointerMoved(button, at), at);
}

describe('createButton', () => {
  it('starts idle and centered', () => {
    const button = createButton(WINDOW);
    expect(button.phase).toBe('idle');
    expect(button.rect).toEqual({ x: 350, y: 270, w: 200, h: 60 });
  });

  it('accepts a custom size', () => {
    const button = createButton(WINDOW, { width: 100, height: 40 });
    expect(button.rect).toEqual({ x: 400, y: 280, w: 100, h: 40 });
  });
});

describe('pointerMoved', () => {
  it('enters hover inside the rect', () => {
    expect(pointerMoved(createButton(WINDOW), INSIDE).phase).toBe('hover');
  });

  it('returns to idle when the pointer leaves', () => {
    const hovered = pointerMoved(createButton(WINDOW), INSIDE);
    expect(pointerMoved(hovered, OUTSIDE).phase).toBe('idle');
  });

  it('treats a missing pointer as outside', () => {
    const hovered = pointerMoved(createButton(WINDOW), INSIDE);
    expect(pointerMoved(hovered, null).phase).toBe('idle');
  });

  it('keeps the same object when nothing changes', () => {
    const button = createButton(WINDOW);
    expect(pointerMoved(button, OUTSIDE)).toBe(button);
  });

  it('toggles between pressed and active-outside during an active press', () => {
    const pressed = press(createButton(WINDOW));
    const outside = pointerMoved(pressed, OUTSIDE);
    expect(outside.phase).toBe('active-outside');
    expect(isPressed(outside)).toBe(false);
    expect(isActivePress(outside)).toBe(true);
    expect(pointerMoved(outside, INSIDE).phase).toBe('pressed');
  });

  it('uses the half-open rect edges', () => {
    const button = createButton(WINDOW);
    expect(pointerMoved(button, { x: 350, y: 270 }).phase).toBe('hover');
    expect(pointerMoved(button, { x: 550, y: 300 }).phase).toBe('idle');
    expect(pointerMoved(button, { x: 450, y: 330 }).phase).toBe('idle');
  });
});

describe('pointerPressed', () => {
  it('latches an active press inside', () => {
    const pressed = press(createButton(WINDOW));
    expect(pressed.phase).toBe('pressed');
    expect(isActivePress(pressed)).toBe(true);
    expect(isHovered(pressed)).toBe(true);
  });

  it('does not engage a press that starts outside', () => {
    const button = press(createButton(WINDOW), OUTSIDE);
    expect(button.phase).toBe('idle');
    expect(isActivePress(button)).toBe(false);
  });

  it('does not turn into a press when moving inside after an outside press', () => {
    const button = press(createButton(WINDOW), OUTSIDE);
    expect(pointerMoved(button, INSIDE).phase).toBe('hover');
  });
});

describe('pointerReleased', () => {
  it('confirms a click for press and release inside', () => {
    const result = pointerReleased(press(createButton(WINDOW)), INSIDE);
    expect(result.clicked).toBe(true);
    expect(result.button.phase).toBe('hover');
  });

  it('does not click when released outside', () => {
    const pressed = press(createButton(WINDOW));
    const result = pointerReleased(pointerMoved(pressed, OUTSIDE), OUTSIDE);
    expect(result.clicked).toBe(false);
    expect(result.button.phase).toBe('idle');
  });

  it('does not click when the press started outside', () => {
    const button = pointerMoved(press(createButton(WINDOW), OUTSIDE), INSIDE);
    const result = pointerReleased(button, INSIDE);
    expect(result.clicked).toBe(false);
    expect(result.button.phase).toBe('hover');
  });

  it('clicks after leaving and returning before release', () => {
    let button = press(createButton(WINDOW));
    button = pointerMoved(button, OUTSIDE);
    button = pointerMoved(button, INSIDE);
    expect(pointerReleased(button, INSIDE).clicked).toBe(true);
  });

  it('does not click on a release without a press', () => {
    const hovered = pointerMoved(createButton(WINDOW), INSIDE);
    expect(pointerReleased(hovered, INSIDE).clicked).toBe(false);
  });

  it('always clears the active press', () => {
    const states: Button[] = [
      createButton(WINDOW),
      pointerMoved(createButton(WINDOW), INSIDE),
      press(createButton(WINDOW)),
      pointerMoved(press(createButton(WINDOW)), OUTSIDE),
    ];
    for (const state of states) {
      for (const at of [INSIDE, OUTSIDE]) {
        const { button } = pointerReleased(state, at);
        expect(isActivePress(button)).toBe(false);
        expect(isPressed(button)).toBe(false);
      }
    }
  });

  it('yields exactly one click per press/release pair', () => {
    let button = createButton(WINDOW);
    let clicks = 0;
    for (let i = 0; i < 3; i++) {
      button = press(button);
      const result = pointerReleased(button, INSIDE);
      button = result.button;
      if (result.clicked) clicks++;
      // A second release without a new press never clicks
      const again = pointerReleased(button, INSIDE);
      button = again.button;
      if (again.clicked) clicks++;
    }
    expect(clicks).toBe(3);
  });
});

describe('pointerCancelled', () => {
  it('clears a press without clicking and keeps hover inside', () => {
    const button = pointerCancelled(press(createButton(WINDOW)), INSIDE);
    expect(button.phase).toBe('hover');
    expect(isActivePress(button)).toBe(false);
    expect(pointerReleased(button, INSIDE).clicked).toBe(false);
  });

  it('returns to idle when cancelled away from the button', () => {
    const away = pointerMoved(press(createButton(WINDOW)), OUTSIDE);
    expect(pointerCancelled(away, OUTSIDE).phase).toBe('idle');
    expect(pointerCancelled(press(createButton(WINDOW)), null).phase).toBe('idle');
  });

  it('does not come back as pressed on a later hover', () => {
    const cancelled = pointerCancelled(press(createButton(WINDOW)), INSIDE);
    const moved = pointerMoved(pointerMoved(cancelled, OUTSIDE), { x: 451, y: 301 });
    expect(moved.phase).toBe('hover');
    expect(isPressed(moved)).toBe(false);
  });

  it('leaves a button with no press untouched', () => {
    const hovered = pointerMoved(createButton(WINDOW), INSIDE);
    expect(pointerCancelled(hovered, OUTSIDE)).toBe(hovered);
  });
});

describe('relayout', () => {
  it('recenters with a fixed size', () => {
    const button = relayout(createButton(WINDOW), { width: 1280, height: 720 });
    expect(button.rect).toEqual({ x: 540, y: 330, w: 200, h: 60 });
  });

  it('keeps the current phase', () => {
    const pressed = press(createButton(WINDOW));
    expect(relayout(pressed, { width: 400, height: 300 }).phase).toBe('pressed');
  });

  it('matches (W-200)/2, (H-60)/2 for several sizes', () => {
    for (const [width, height] of [
      [640, 480],
      [1024, 768],
      [300, 100],
    ]) {
      const { rect } = relayout(createButton(WINDOW), { width, height });
      expect(rect).toEqual({ x: (width - 200) / 2, y: (height - 60) / 2, w: 200, h: 60 });
    }
  });
});
