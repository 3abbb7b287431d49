/**
 * @beepbutton/synth
 * Tone synthesis and the audio sink contract
 */

export * from './types.js';
export * from './tone/index.js';
