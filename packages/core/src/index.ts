/**
 * @vidsynth/core: audio model, mode host, render driver and frame loop.
 */

export { Engine, DEFAULT_UPLOAD_DIR } from "./engine.js";
export type { EngineOptions, EngineStatus } from "./engine.js";

export { ExecutionContext, AUDIO_BUFFER_SIZE, DEFAULT_RESOLUTION, hueToRgb } from "./context.js";
export type { RgbTriple } from "./context.js";
export { KnobBank, KNOB_NAMES, DEFAULT_KNOB_VALUE } from "./knobs.js";
export type { KnobName, KnobValues } from "./knobs.js";

export {
  AudioState,
  DEFAULT_AUDIO_CONFIG,
  EXTERNAL_PEAK_DIVISOR,
  EXTERNAL_TRIGGER_THRESHOLD,
  SYNTHETIC_PEAK_DIVISOR,
  SYNTHETIC_TRIGGER_THRESHOLD,
} from "./audio/audio-state.js";
export type { AudioConfig, AudioSnapshot } from "./audio/audio-state.js";
export { AUDIO_TYPES, FULL_SCALE, SAMPLE_RATE, synthesize } from "./audio/synthesis.js";
export type { AudioType, SynthesisParams } from "./audio/synthesis.js";

export { ModeHost } from "./mode/mode-host.js";
export type { LoadResult, LoadedMode, ModeFunction, ModeHostOptions } from "./mode/mode-host.js";
export {
  MODE_ENTRY_FILE,
  UPLOADED_PREFIX,
  listModes,
  modeDisplayName,
  writeUploadedMode,
} from "./mode/mode-directory.js";
export type { ModeEntry } from "./mode/mode-directory.js";
export { describeError, firstLine, formatFailure } from "./mode/errors.js";
export type { ErrorDescription } from "./mode/errors.js";

export { RenderDriver, NO_MODE_LOADED, jpegFrameEncoder } from "./render/render-driver.js";
export type { FrameEncoder, FrameResult, RenderDriverOptions } from "./render/render-driver.js";

export {
  FrameLoop,
  DEFAULT_MAX_CONSECUTIVE_ERRORS,
  DEFAULT_TARGET_FPS,
} from "./loop/frame-loop.js";
export type { FrameLoopOptions, FrameSource, LoopState, StartResult } from "./loop/frame-loop.js";
export type { FramePublisher, StatusLevel, StatusMessage } from "./loop/publisher.js";
export { RecordingPublisher } from "./loop/recording-publisher.js";
export type { PublishedEvent } from "./loop/recording-publisher.js";

export type { CancelHandle, Clock } from "./clock.js";
export { NodeClock } from "./node-clock.js";
export { TestClock } from "./test-clock.js";
