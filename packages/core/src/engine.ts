/**
 * Engine: the process-wide emulator state behind one facade.
 *
 * Owns the canonical screen, the execution context, knobs, audio, the
 * Mode Host and the Render Driver. The transport layer talks only to this.
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import { Surface, gfx } from "@vidsynth/surface";
import { AudioState } from "./audio/audio-state.js";
import type { AudioSnapshot } from "./audio/audio-state.js";
import { DEFAULT_RESOLUTION, ExecutionContext } from "./context.js";
import { KnobBank } from "./knobs.js";
import type { KnobValues } from "./knobs.js";
import { describeError } from "./mode/errors.js";
import { writeUploadedMode } from "./mode/mode-directory.js";
import { ModeHost } from "./mode/mode-host.js";
import type { LoadResult } from "./mode/mode-host.js";
import { RenderDriver, jpegFrameEncoder } from "./render/render-driver.js";
import type { FrameEncoder, FrameResult } from "./render/render-driver.js";

export interface EngineOptions {
  /** Screen width in pixels. Default: 1280. */
  readonly width?: number;
  /** Screen height in pixels. Default: 720. */
  readonly height?: number;
  /** JPEG quality for frames when no custom encoder is given. Default: 85. */
  readonly jpegQuality?: number;
  readonly encode?: FrameEncoder;
  /** Random source for noise audio. Default: `Math.random`. */
  readonly random?: () => number;
  /** Where uploaded mode sources are written. */
  readonly uploadDir?: string;
}

export interface EngineStatus {
  readonly modeLoaded: boolean;
  readonly currentMode: string;
  readonly knobs: KnobValues;
  readonly resolution: readonly [number, number];
  readonly audio: AudioSnapshot;
}

export const DEFAULT_UPLOAD_DIR = join(tmpdir(), "vidsynth-uploaded-modes");

export class Engine {
  readonly screen: Surface;
  readonly context: ExecutionContext;
  readonly knobs = new KnobBank();
  readonly audio: AudioState;
  readonly modes: ModeHost;
  private readonly driver: RenderDriver;
  private readonly uploadDir: string;

  constructor(options: EngineOptions = {}) {
    const width = options.width ?? DEFAULT_RESOLUTION.width;
    const height = options.height ?? DEFAULT_RESOLUTION.height;
    this.screen = new Surface([width, height]);
    this.context = new ExecutionContext(width, height);
    this.context.screen = this.screen;
    this.audio = new AudioState(this.context, options.random);
    this.modes = new ModeHost({
      gfx,
      screen: this.screen,
      context: this.context,
      knobs: () => this.knobs.snapshot(),
    });
    this.driver = new RenderDriver({
      screen: this.screen,
      context: this.context,
      knobs: this.knobs,
      audio: this.audio,
      modes: this.modes,
      encode: options.encode ?? jpegFrameEncoder(options.jpegQuality),
    });
    this.uploadDir = options.uploadDir ?? DEFAULT_UPLOAD_DIR;
  }

  /**
   * Set knob `index` (1..5) to `value`, clamped to [0, 1], and make it
   * visible to the current mode right away. Bad indices are ignored.
   */
  setKnob(index: number, value: number): boolean {
    if (!this.knobs.set(index, value)) return false;
    this.modes.bindKnobs(this.knobs.snapshot());
    return true;
  }

  configureAudio(type: string, level: number, frequency: number): void {
    this.audio.configure(type, level, frequency);
  }

  /** Feed captured audio bytes (0..255, 128 = silence). */
  ingestAudio(samples: unknown): boolean {
    return this.audio.ingest(samples);
  }

  renderFrame(): FrameResult {
    return this.driver.renderFrame();
  }

  loadMode(directory: string): LoadResult {
    return this.modes.load(directory);
  }

  /** Save uploaded script content as a mode directory and load it. */
  loadModeSource(filename: string, content: string): LoadResult {
    let directory: string;
    try {
      directory = writeUploadedMode(this.uploadDir, filename, content);
    } catch (err) {
      return { success: false, message: describeError(err).message };
    }
    const result = this.modes.load(directory);
    return result.success
      ? { success: true, message: `Uploaded mode "${filename}" loaded successfully` }
      : result;
  }

  getStatus(): EngineStatus {
    return {
      modeLoaded: this.modes.loaded !== null,
      currentMode: this.context.mode,
      knobs: this.knobs.snapshot(),
      resolution: [this.screen.width, this.screen.height],
      audio: this.audio.snapshot(),
    };
  }
}
