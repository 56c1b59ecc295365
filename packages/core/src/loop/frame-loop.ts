/**
 * Frame Loop Controller: renders at a fixed target rate until stopped or
 * until too many frames in a row fail.
 *
 * The loop is a chain of one-shot timers on the injected clock. Each tick
 * renders synchronously, then schedules the next one for whatever remains
 * of the frame period (never less than zero). Late ticks are not made up,
 * so under sustained overrun the frame rate simply drops. Control
 * operations run between ticks on the same event loop.
 */

import type { CancelHandle, Clock } from "../clock.js";
import { describeError, firstLine } from "../mode/errors.js";
import type { FrameResult } from "../render/render-driver.js";
import type { FramePublisher, StatusMessage } from "./publisher.js";

export const DEFAULT_TARGET_FPS = 30;
export const DEFAULT_MAX_CONSECUTIVE_ERRORS = 10;
/** A progress line is logged every this many rendered frames. */
const PROGRESS_EVERY = 30;

const TAG = "[vidsynth:loop]";

export interface FrameSource {
  renderFrame(): FrameResult;
}

export interface FrameLoopOptions {
  readonly source: FrameSource;
  readonly publisher: FramePublisher;
  readonly clock: Clock;
  readonly targetFps?: number;
  readonly maxConsecutiveErrors?: number;
}

export type LoopState = "stopped" | "running";

export interface StartResult {
  readonly started: boolean;
  readonly message: string;
}

export class FrameLoop {
  private readonly source: FrameSource;
  private readonly publisher: FramePublisher;
  private readonly clock: Clock;
  private readonly periodMs: number;
  private readonly maxConsecutiveErrors: number;

  private running = false;
  /** Bumped on every start/stop so callbacks from an older run do nothing. */
  private generation = 0;
  private pending: CancelHandle | null = null;
  private consecutiveErrors = 0;
  private rendered = 0;

  constructor(options: FrameLoopOptions) {
    this.source = options.source;
    this.publisher = options.publisher;
    this.clock = options.clock;
    const fps = options.targetFps ?? DEFAULT_TARGET_FPS;
    if (!(fps > 0)) {
      throw new Error(`targetFps must be positive, got ${fps}`);
    }
    this.periodMs = 1000 / fps;
    this.maxConsecutiveErrors = options.maxConsecutiveErrors ?? DEFAULT_MAX_CONSECUTIVE_ERRORS;
  }

  get state(): LoopState {
    return this.running ? "running" : "stopped";
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Frames successfully rendered and published since construction. */
  get framesRendered(): number {
    return this.rendered;
  }

  /** Begin ticking. A second start while running changes nothing. */
  start(): StartResult {
    if (this.running) {
      return { started: false, message: "Already running" };
    }
    this.running = true;
    this.consecutiveErrors = 0;
    const generation = ++this.generation;
    console.log(`${TAG} Render loop started`);
    this.notify(() => this.publisher.publishRunningState(true));
    this.pending = this.clock.schedule(0, () => this.tick(generation));
    return { started: true, message: "Rendering started" };
  }

  /**
   * Stop ticking. Takes effect before the next tick; a frame already in
   * progress finishes.
   *
   * @returns Whether the loop was running.
   */
  stop(): boolean {
    if (!this.running) return false;
    this.halt();
    console.log(`${TAG} Render loop stopped`);
    this.notify(() => this.publisher.publishRunningState(false));
    return true;
  }

  private tick(generation: number): void {
    if (!this.running || generation !== this.generation) return;
    this.pending = null;
    const startedAt = this.clock.now();

    const failure = this.renderOnce();
    if (failure !== null) {
      this.consecutiveErrors += 1;
      console.error(`${TAG} Render error (${this.consecutiveErrors}): ${failure}`);
      if (this.consecutiveErrors >= this.maxConsecutiveErrors) {
        this.giveUp(failure);
        return;
      }
      this.status({ message: `Render error (${this.consecutiveErrors}): ${firstLine(failure)}`, level: "error" });
    }

    // A publisher callback may have stopped the loop.
    if (!this.running || generation !== this.generation) return;
    const elapsed = this.clock.now() - startedAt;
    this.pending = this.clock.schedule(Math.max(0, this.periodMs - elapsed), () => this.tick(generation));
  }

  /** Render and publish one frame; the error text on failure, else null. */
  private renderOnce(): string | null {
    try {
      const result = this.source.renderFrame();
      if (result.image === null) return result.error;
      this.publisher.publishFrame(result.image);
      this.consecutiveErrors = 0;
      this.rendered += 1;
      if (this.rendered % PROGRESS_EVERY === 0) {
        console.log(`${TAG} Rendered ${this.rendered} frames`);
      }
      return null;
    } catch (err) {
      return describeError(err).message;
    }
  }

  private giveUp(error: string): void {
    this.halt();
    console.error(`${TAG} Too many consecutive errors, stopping render loop`);
    this.status({ message: `Stopped after ${this.maxConsecutiveErrors} errors: ${error}`, level: "error" });
    this.notify(() => this.publisher.publishRunningState(false));
  }

  private halt(): void {
    this.running = false;
    this.generation += 1;
    this.pending?.cancel();
    this.pending = null;
  }

  private status(status: StatusMessage): void {
    this.notify(() => this.publisher.publishStatus(status));
  }

  /** Publisher failures outside a frame are logged, not counted. */
  private notify(publish: () => void): void {
    try {
      publish();
    } catch (err) {
      console.error(`${TAG} Publisher failed: ${describeError(err).message}`);
    }
  }
}
