/**
 * TestClock: deterministic clock for frame loop tests.
 *
 * Time moves only when the test says so. No real timers are involved, so
 * tests are instant and deterministic.
 */

import type { CancelHandle, Clock } from "./clock.js";

interface Pending {
  readonly dueAt: number;
  readonly callback: () => void;
}

/**
 * A clock that advances time only when explicitly told to.
 * Due callbacks fire synchronously during `advance()`.
 *
 * @example
 * ```ts
 * const clock = new TestClock();
 * const loop = new FrameLoop({ driver, publisher, clock });
 *
 * loop.start();
 * clock.advance(0);       // first tick
 * clock.advance(1000 / 30); // second tick
 * ```
 */
export class TestClock implements Clock {
  private currentTime = 0;
  private nextId = 1;
  private scheduled = new Map<number, Pending>();

  /** Current time in milliseconds. Starts at 0. */
  now(): number {
    return this.currentTime;
  }

  schedule(delayMs: number, callback: () => void): CancelHandle {
    const id = this.nextId++;
    this.scheduled.set(id, { dueAt: this.currentTime + Math.max(0, delayMs), callback });
    return {
      cancel: () => {
        this.scheduled.delete(id);
      },
    };
  }

  /**
   * Advance time by `ms` and fire every callback due by then, in due order.
   *
   * Callbacks scheduled while firing wait for the next `advance()` call, even
   * when their delay is zero (not re-entrant within the same advance).
   */
  advance(ms: number): void {
    this.currentTime += ms;
    const due = [...this.scheduled.entries()]
      .filter(([, pending]) => pending.dueAt <= this.currentTime)
      .sort((a, b) => a[1].dueAt - b[1].dueAt || a[0] - b[0]);
    for (const [id, pending] of due) {
      // Skip callbacks cancelled by an earlier one in this batch.
      if (!this.scheduled.delete(id)) continue;
      pending.callback();
    }
  }

  /** Move time forward without firing anything, as if work took `ms`. */
  elapse(ms: number): void {
    this.currentTime += ms;
  }

  /** Number of callbacks not yet fired or cancelled. */
  get pendingCount(): number {
    return this.scheduled.size;
  }
}
