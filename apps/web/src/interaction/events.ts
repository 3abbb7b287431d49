/**
 * Host Events
 *
 * Platform input translated into a small event vocabulary. The host queues
 * events as they arrive and the frame loop drains them once per frame.
 */

// =============================================================================
// EVENT TYPES
// =============================================================================

export type PointerButton = 'left' | 'middle' | 'right' | 'other';

export type HostEvent =
  | { type: 'quit' }
  | { type: 'resize'; width: number; height: number }
  | { type: 'pointer-down'; button: PointerButton; x: number; y: number }
  | { type: 'pointer-up'; button: PointerButton; x: number; y: number }
  | { type: 'pointer-move'; x: number; y: number }
  /** The host abandoned the current press: pointercancel or lost pointer capture */
  | { type: 'pointer-cancel'; x: number; y: number };

/** The subset of a DOM PointerEvent the translation reads */
export type PointerSample = {
  button: number;
  offsetX: number;
  offsetY: number;
};

// =============================================================================
// TRANSLATION
// =============================================================================

/**
 * Map a DOM `MouseEvent.button` index to a named button.
 */
export function pointerButton(index: number): PointerButton {
  switch (index) {
    case 0:
      return 'left';
    case 1:
      return 'middle';
    case 2:
      return 'right';
    default:
      return 'other';
  }
}

/** Surface coordinates are whole pixels */
export function pointerPosition(sample: Pick<PointerSample, 'offsetX' | 'offsetY'>): { x: number; y: number } {
  return { x: Math.floor(sample.offsetX), y: Math.floor(sample.offsetY) };
}

export function toPointerDown(sample: PointerSample): HostEvent {
  return { type: 'pointer-down', button: pointerButton(sample.button), ...pointerPosition(sample) };
}

export function toPointerUp(sample: PointerSample): HostEvent {
  return { type: 'pointer-up', button: pointerButton(sample.button), ...pointerPosition(sample) };
}

export function toPointerMove(sample: Pick<PointerSample, 'offsetX' | 'offsetY'>): HostEvent {
  return { type: 'pointer-move', ...pointerPosition(sample) };
}

export function toPointerCancel(sample: Pick<PointerSample, 'offsetX' | 'offsetY'>): HostEvent {
  return { type: 'pointer-cancel', ...pointerPosition(sample) };
}

// =============================================================================
// EVENT QUEUE
// =============================================================================

/**
 * FIFO of pending host events. `drain` hands out everything queued so far.
 */
export class EventQueue {
  private pending: HostEvent[] = [];

  push(event: HostEvent): void {
    this.pending.push(event);
  }

  drain(): HostEvent[] {
    const events = this.pending;
    this.pending = [];
    return events;
  }

  get size(): number {
    return this.pending.length;
  }
}
