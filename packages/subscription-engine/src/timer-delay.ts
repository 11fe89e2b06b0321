/**
 * Largest delay setTimeout honors. Node and browsers fire longer delays
 * after 1 ms.
 */
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

export function isValidTimerDelay(ms: number): boolean {
  return Number.isFinite(ms) && ms >= 0 && ms <= MAX_TIMER_DELAY;
}
