/**
 * Poll backoff
 */

/** Largest delay setTimeout honours; longer values fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Delay that follows `currentSeconds`: multiply and truncate to an integer.
 * Starting from the base value this yields 10, 15, 22, 33, 49 for base 10 and multiplier 1.5.
 */
export function nextBackoffDelay(currentSeconds: number, multiplier: number): number {
  return Math.trunc(currentSeconds * multiplier);
}

/**
 * Seconds to a timer-safe millisecond delay
 */
export function toTimerDelay(seconds: number): number {
  const ms = seconds * 1000;
  if (!(ms > 0)) return 0;
  return Math.min(ms, MAX_TIMER_DELAY_MS);
}
