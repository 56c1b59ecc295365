/**
 * Render Driver: turns the current mode into one encoded frame per call.
 *
 * Order per frame: refresh knobs, advance audio, run `setup` once per load,
 * run `draw`, encode. The screen is never cleared on the mode's behalf.
 */

import { DEFAULT_JPEG_QUALITY, encodeJpegDataUri } from "@vidsynth/surface";
import type { Surface } from "@vidsynth/surface";
import type { AudioState } from "../audio/audio-state.js";
import type { ExecutionContext } from "../context.js";
import type { KnobBank } from "../knobs.js";
import { formatFailure } from "../mode/errors.js";
import type { ModeHost } from "../mode/mode-host.js";

/** Either an encoded image or an error message, never both. */
export type FrameResult =
  | { readonly image: string; readonly error: null }
  | { readonly image: null; readonly error: string };

/** Encodes the finished screen for transport. */
export type FrameEncoder = (surface: Surface) => string;

export const NO_MODE_LOADED = "No mode loaded";

export interface RenderDriverOptions {
  readonly screen: Surface;
  readonly context: ExecutionContext;
  readonly knobs: KnobBank;
  readonly audio: AudioState;
  readonly modes: ModeHost;
  /** Defaults to a JPEG data URI at quality 85. */
  readonly encode?: FrameEncoder;
}

export function jpegFrameEncoder(quality: number = DEFAULT_JPEG_QUALITY): FrameEncoder {
  return (surface) => encodeJpegDataUri(surface, quality);
}

export class RenderDriver {
  private readonly encode: FrameEncoder;

  constructor(private readonly options: RenderDriverOptions) {
    this.encode = options.encode ?? jpegFrameEncoder();
  }

  /** Produce one frame. Never throws: mode failures come back as `error`. */
  renderFrame(): FrameResult {
    const { screen, context, knobs, audio, modes } = this.options;
    const mode = modes.loaded;
    if (!mode) return { image: null, error: NO_MODE_LOADED };

    try {
      modes.bindKnobs(knobs.snapshot());
      audio.advance();
      if (!mode.setupDone && mode.setup) {
        mode.setup(screen, context);
        mode.setupDone = true;
      }
      mode.draw(screen, context);
      return { image: this.encode(screen), error: null };
    } catch (err) {
      return { image: null, error: formatFailure("Error rendering frame", err) };
    }
  }
}
