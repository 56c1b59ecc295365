/**
 * RecordingPublisher: captures everything the frame loop publishes, for
 * test assertions.
 */

import type { FramePublisher, StatusMessage } from "./publisher.js";

export type PublishedEvent =
  | { readonly kind: "frame"; readonly image: string }
  | { readonly kind: "status"; readonly status: StatusMessage }
  | { readonly kind: "running"; readonly isRunning: boolean };

/**
 * A FramePublisher that records every call for later inspection.
 *
 * @example
 * ```ts
 * const publisher = new RecordingPublisher();
 * const loop = new FrameLoop({ source, publisher, clock });
 * loop.start();
 * clock.advance(0);
 *
 * expect(publisher.frames).toHaveLength(1);
 * ```
 */
export class RecordingPublisher implements FramePublisher {
  /** Every event in publication order. */
  readonly all: PublishedEvent[] = [];
  readonly frames: string[] = [];
  readonly statuses: StatusMessage[] = [];
  readonly runningStates: boolean[] = [];

  publishFrame(image: string): void {
    this.frames.push(image);
    this.all.push({ kind: "frame", image });
  }

  publishStatus(status: StatusMessage): void {
    this.statuses.push(status);
    this.all.push({ kind: "status", status });
  }

  publishRunningState(isRunning: boolean): void {
    this.runningStates.push(isRunning);
    this.all.push({ kind: "running", isRunning });
  }

  clear(): void {
    this.all.length = 0;
    this.frames.length = 0;
    this.statuses.length = 0;
    this.runningStates.length = 0;
  }
}
