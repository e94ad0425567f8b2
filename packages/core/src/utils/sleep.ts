// packages/core/src/utils/sleep.ts — Retry delay

import { MAX_TIMER_MS } from './constants.js';

/**
 * Promise-based delay. Non-positive durations resolve on the next tick;
 * durations beyond the timer range are capped at MAX_TIMER_MS.
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, Math.min(ms, MAX_TIMER_MS)));
}
