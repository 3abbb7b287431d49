/**
 * Background color action
 */

import {
  BACKGROUND_CHANNEL_MAX,
  BACKGROUND_CHANNEL_MIN,
  randomInt,
  type RandomSource,
  type Rgb,
} from '@beepbutton/shared';

export interface ChannelRange {
  min: number;
  max: number;
}

const DEFAULT_RANGE: ChannelRange = { min: BACKGROUND_CHANNEL_MIN, max: BACKGROUND_CHANNEL_MAX };

/**
 * Draw a fresh background color: three independent uniform channels in
 * [range.min, range.max]. The result replaces the previous color as a whole.
 */
export function randomBackground(
  random: RandomSource = Math.random,
  range: ChannelRange = DEFAULT_RANGE
): Rgb {
  const r = randomInt(range.min, range.max, random);
  const g = randomInt(range.min, range.max, random);
  const b = randomInt(range.min, range.max, random);
  return { r, g, b };
}
