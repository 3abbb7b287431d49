import { describe, it, expect } from 'vitest';
import { EventQueue, pointerButton, toPointerCancel, toPointerDown, toPointerMove, toPointerUp } from './events.js';

describe('pointerButton', () => {
  it('names the standard buttons', () => {
    expect(pointerButton(0)).toBe('left');
    expect(pointerButton(1)).toBe('middle');
    expect(pointerButton(2)).toBe('right');
    expect(pointerButton(4)).toBe('other');
  });
});

describe('pointer translation', () => {
  it('floors fractional offsets to whole pixels', () => {
    expect(toPointerDown({ button: 0, offsetX: 450.7, offsetY: 299.2 })).toEqual({
      type: 'pointer-down',
      button: 'left',
      x: 450,
      y: 299,
    });
    expect(toPointerUp({ button: 2, offsetX: 10, offsetY: 12.9 })).toEqual({
      type: 'pointer-up',
      button: 'right',
      x: 10,
      y: 12,
    });
    expect(toPointerMove({ offsetX: 0.5, offsetY: 599.99 })).toEqual({ type: 'pointer-move', x: 0, y: 599 });
    expect(toPointerCancel({ offsetX: 451.5, offsetY: 301 })).toEqual({ type: 'pointer-cancel', x: 451, y: 301 });
  });
});

describe('EventQueue', () => {
  it('drains events in arrival order and empties', () => {
    const queue = new EventQueue();
    queue.push({ type: 'pointer-move', x: 1, y: 2 });
    queue.push({ type: 'quit' });
    expect(queue.size).toBe(2);
    expect(queue.drain()).toEqual([{ type: 'pointer-move', x: 1, y: 2 }, { type: 'quit' }]);
    expect(queue.size).toBe(0);
    expect(queue.drain()).toEqual([]);
  });

  it('keeps events pushed after a drain for the next one', () => {
    const queue = new EventQueue();
    queue.push({ type: 'quit' });
    const first = queue.drain();
    queue.push({ type: 'resize', width: 800, height: 600 });
    expect(first).toEqual([{ type: 'quit' }]);
    expect(queue.drain()).toEqual([{ type: 'resize', width: 800, height: 600 }]);
  });
});
