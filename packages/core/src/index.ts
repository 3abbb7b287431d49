/**
 * @beepbutton/core
 * Config schema, button state machine, and click actions for Beep Button
 */

export * from './schema/index.js';
export * from './button/index.js';
export * from './background/index.js';
