/**
 * Synthetic audio buffers, one per frame.
 *
 * Waveforms are pure functions of the frame index so successive frames join
 * up in phase: sample `i` of frame `n` sits at `n * 100 + i` on a virtual
 * 44.1 kHz timeline.
 */

import { AUDIO_BUFFER_SIZE } from "../context.js";

export const SAMPLE_RATE = 44100;

/** Largest positive 16-bit sample; synthetic amplitude at level 1. */
export const FULL_SCALE = 32767;

const BEAT_HZ = 2;
const KICK_HZ = 60;
/** Fraction of each beat cycle the kick occupies. */
const KICK_LENGTH = 0.1;

export type AudioType = "sine" | "noise" | "beat" | "silence" | "file";

export const AUDIO_TYPES: readonly AudioType[] = ["sine", "noise", "beat", "silence", "file"];

export interface SynthesisParams {
  /** 0..1 */
  readonly level: number;
  /** Hz, for the sine wave. */
  readonly frequency: number;
  readonly frameIndex: number;
  /** Uniform in [0, 1). */
  readonly random: () => number;
}

function timeOf(frameIndex: number, i: number): number {
  return (frameIndex * AUDIO_BUFFER_SIZE + i) / SAMPLE_RATE;
}

function sine({ level, frequency, frameIndex }: SynthesisParams): number[] {
  const amplitude = level * FULL_SCALE;
  return Array.from({ length: AUDIO_BUFFER_SIZE }, (_, i) =>
    amplitude * Math.sin(2 * Math.PI * frequency * timeOf(frameIndex, i)),
  );
}

function noise({ level, random }: SynthesisParams): number[] {
  const amplitude = level * FULL_SCALE;
  return Array.from({ length: AUDIO_BUFFER_SIZE }, () => -amplitude + 2 * amplitude * random());
}

function beat({ level, frameIndex }: SynthesisParams): number[] {
  return Array.from({ length: AUDIO_BUFFER_SIZE }, (_, i) => {
    const t = timeOf(frameIndex, i);
    const phase = (t * BEAT_HZ) % 1;
    if (phase >= KICK_LENGTH) return 0;
    const envelope = (KICK_LENGTH - phase) / KICK_LENGTH;
    return level * FULL_SCALE * envelope * Math.sin(2 * Math.PI * KICK_HZ * t);
  });
}

/**
 * One buffer of `type` audio. `file` (before any external audio arrives)
 * and unrecognised types produce the sine wave.
 */
export function synthesize(type: string, params: SynthesisParams): number[] {
  switch (type) {
    case "silence":
      return new Array<number>(AUDIO_BUFFER_SIZE).fill(0);
    case "noise":
      return noise(params);
    case "beat":
      return beat(params);
    default:
      return sine(params);
  }
}
