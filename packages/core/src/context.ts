/**
 * The shared execution context handed to every `setup` and `draw` call
 * (exposed to modes as both `etc` and `eyesy`).
 *
 * One instance lives for the whole session. Audio and knob fields are
 * rewritten every frame; `mode` changes on load.
 */

import type { Surface } from "@vidsynth/surface";
import { DEFAULT_KNOB_VALUE } from "./knobs.js";
import type { KnobValues } from "./knobs.js";

/** Samples per audio buffer, matching the hardware. */
export const AUDIO_BUFFER_SIZE = 100;

export const DEFAULT_RESOLUTION = { width: 1280, height: 720 } as const;

export type RgbTriple = [number, number, number];

function silence(): number[] {
  return new Array<number>(AUDIO_BUFFER_SIZE).fill(0);
}

/** Six-sector hue wheel at full saturation and value; `hue` in degrees. */
export function hueToRgb(hue: number): RgbTriple {
  const h = hue / 60;
  const c = 255;
  const x = Math.trunc(c * (1 - Math.abs((h % 2) - 1)));
  if (h < 1) return [c, x, 0];
  if (h < 2) return [x, c, 0];
  if (h < 3) return [0, c, x];
  if (h < 4) return [0, x, c];
  if (h < 5) return [x, 0, c];
  return [c, 0, x];
}

function unit(value: number): number {
  const v = Number(value);
  return Number.isFinite(v) ? Math.max(0, Math.min(1, v)) : 0;
}

export class ExecutionContext {
  audioIn: number[] = silence();
  audioLeft: number[] = silence();
  audioRight: number[] = silence();
  audioInR: number[] = silence();
  audioPeak = 0;
  audioPeakR = 0;
  audioTrig = false;
  /** Alias of `audioTrig`, kept in step with it. */
  trig = false;

  knob1 = DEFAULT_KNOB_VALUE;
  knob2 = DEFAULT_KNOB_VALUE;
  knob3 = DEFAULT_KNOB_VALUE;
  knob4 = DEFAULT_KNOB_VALUE;
  knob5 = DEFAULT_KNOB_VALUE;

  /** Display name of the active mode. */
  mode = "unknown";
  readonly xres: number;
  readonly yres: number;

  // No MIDI input is wired; these hold the hardware's idle values.
  midiNoteNew = false;
  midiNote = 60;
  midiVelocity = 127;
  midiNotes: number[] = new Array<number>(128).fill(0);
  midiClk = 0;

  bgColor: RgbTriple = [0, 0, 0];
  fgColor: RgbTriple = [255, 255, 255];
  autoClear = true;
  fps = 30;
  /** The canonical screen surface. */
  screen: Surface | null = null;

  constructor(xres: number = DEFAULT_RESOLUTION.width, yres: number = DEFAULT_RESOLUTION.height) {
    this.xres = xres;
    this.yres = yres;
  }

  /** Background color for a [0, 1] control value. */
  readonly colorPickerBg = (value: number): RgbTriple => hueToRgb(unit(value) * 360);

  /** Foreground color: the background wheel turned half way round. */
  readonly colorPickerFg = (value: number): RgbTriple => hueToRgb((unit(value) * 360 + 180) % 360);

  readonly colorPicker = (value: number): RgbTriple => this.colorPickerBg(value);

  applyKnobs(values: KnobValues): void {
    this.knob1 = values.knob1;
    this.knob2 = values.knob2;
    this.knob3 = values.knob3;
    this.knob4 = values.knob4;
    this.knob5 = values.knob5;
  }
}
