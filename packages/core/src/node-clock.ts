/**
 * NodeClock: real-time clock for running the frame loop in Node.js.
 *
 * Uses `performance.now()` for timestamps and `setTimeout` for scheduling.
 * This is the production clock; see `TestClock` for tests.
 */

import type { CancelHandle, Clock } from "./clock.js";

/**
 * A clock backed by `performance.now()` and `setTimeout`.
 *
 * @example
 * ```ts
 * const loop = new FrameLoop({ driver, publisher, clock: new NodeClock() });
 * loop.start(); // ticks at ~30fps on the event loop
 * ```
 */
export class NodeClock implements Clock {
  now(): number {
    return performance.now();
  }

  schedule(delayMs: number, callback: () => void): CancelHandle {
    const timer = setTimeout(callback, Math.max(0, delayMs));
    return { cancel: () => clearTimeout(timer) };
  }
}
