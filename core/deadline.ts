/** Largest delay setTimeout honours; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Calls `onExpire` once at least `timeoutMs` have passed on the wall clock.
 * Timers may fire a millisecond early, so an early wake-up re-arms for the
 * remainder, and so does a deadline beyond the longest timer delay. Returns
 * a cancel function.
 */
export function startDeadline(timeoutMs: number, onExpire: () => void): () => void {
  const deadline = Date.now() + timeoutMs;
  let handle: ReturnType<typeof setTimeout> | null = null;

  const arm = (delay: number): void => {
    handle = setTimeout(() => {
      const remaining = deadline - Date.now();
      if (remaining > 0) {
        arm(remaining);
        return;
      }
      handle = null;
      onExpire();
    }, Math.min(delay, MAX_TIMER_DELAY_MS));
  };

  arm(timeoutMs);

  return () => {
    if (handle) {
      clearTimeout(handle);
      handle = null;
    }
  };
}

export function assertTimeout(timeoutMs: number, name = 'timeoutMs'): void {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`${name} must be a finite positive number. Got: ${timeoutMs}`);
  }
}
