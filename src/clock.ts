import type { u256 } from "../runtime/index.js";

/** Source of change-record timestamps */
export type Clock = () => u256;

/** Wall time in whole seconds since the Unix epoch (the unit of a block timestamp) */
export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

/** Always returns the same timestamp */
export function fixedClock(timestamp: u256): Clock {
  return () => timestamp;
}

/**
 * Monotonic tick clock: returns start, start + 1, start + 2, ...
 */
export function logicalClock(start: u256 = 0n): Clock {
  let next = start;
  return () => {
    const current = next;
    next = next + 1n;
    return current;
  };
}
