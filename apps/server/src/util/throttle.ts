/**
 * Fixed-rate dispatch throttle
 */

import { type Sleep, sleep } from "./retry.ts";

/**
 * Returns a function to await after each dispatched item; it pauses for
 * 1 / maxPerSecond seconds so bulk dispatch is a steady trickle.
 */
export const createThrottle = (maxPerSecond: number, wait: Sleep = sleep) => {
  const intervalMs = maxPerSecond > 0 ? 1000 / maxPerSecond : 0;
  return async (): Promise<void> => {
    if (intervalMs > 0) await wait(intervalMs);
  };
};
