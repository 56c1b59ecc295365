/**
 * Clock abstraction for the frame loop.
 *
 * Allows the loop to run on real timers in Node.js or on manual time in
 * tests. The loop never calls `setTimeout` or `performance.now()` directly;
 * it always goes through a Clock.
 */

/** Handle returned by scheduling operations. Call `cancel()` to unschedule. */
export interface CancelHandle {
  cancel(): void;
}

/** Time source and one-shot timer for the frame loop. */
export interface Clock {
  /** Current time in milliseconds (monotonic). */
  now(): number;

  /**
   * Run `callback` once, `delayMs` from now.
   *
   * @returns A handle to cancel the scheduled callback.
   */
  schedule(delayMs: number, callback: () => void): CancelHandle;
}
