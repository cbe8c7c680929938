import type { Clock } from './types.js';

/**
 * Wall-clock time
 */
export const systemClock: Clock = {
  now: () => Date.now(),
};
