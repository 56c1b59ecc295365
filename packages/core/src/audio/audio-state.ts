/**
 * Audio State Model: owns the simulation settings and writes one audio
 * buffer per frame into the execution context, synthesised or ingested.
 */

import { AUDIO_BUFFER_SIZE } from "../context.js";
import type { ExecutionContext } from "../context.js";
import { synthesize } from "./synthesis.js";

/** Synthetic peaks are measured against the largest positive sample... */
export const SYNTHETIC_PEAK_DIVISOR = 32767;
export const SYNTHETIC_TRIGGER_THRESHOLD = 0.3;
/** ...ingested ones against the magnitude of the most negative one. */
export const EXTERNAL_PEAK_DIVISOR = 32768;
export const EXTERNAL_TRIGGER_THRESHOLD = 0.1;

/** Byte value meaning silence in captured audio. */
const BYTE_SILENCE = 128;

export interface AudioConfig {
  readonly type: string;
  readonly level: number;
  readonly frequency: number;
}

export interface AudioSnapshot extends AudioConfig {
  readonly frameCount: number;
  readonly externalAudioReceived: boolean;
}

export const DEFAULT_AUDIO_CONFIG: AudioConfig = { type: "sine", level: 0, frequency: 440 };

function isSampleSequence(value: unknown): value is ArrayLike<unknown> {
  return Array.isArray(value) || value instanceof Uint8Array || value instanceof Uint8ClampedArray;
}

export class AudioState {
  private config: AudioConfig = DEFAULT_AUDIO_CONFIG;
  private frameCount = 0;
  /** Set by the first ingested buffer; cleared when the type is set to `file`. */
  private externalAudioReceived = false;

  constructor(
    private readonly context: ExecutionContext,
    private readonly random: () => number = Math.random,
  ) {}

  /**
   * Change the simulation. `level` is clamped to [0, 1].
   *
   * Selecting `file` re-arms the wait for external audio; selecting anything
   * else drops whatever was ingested and silences the buffers until the next
   * frame is synthesised.
   */
  configure(type: string, level: number, frequency: number): void {
    const lvl = Number.isFinite(level) ? Math.max(0, Math.min(1, level)) : 0;
    const freq = Number.isFinite(frequency) ? frequency : this.config.frequency;
    this.config = { type, level: lvl, frequency: freq };
    if (type === "file") {
      this.externalAudioReceived = false;
    } else {
      this.publish(new Array<number>(AUDIO_BUFFER_SIZE).fill(0), SYNTHETIC_PEAK_DIVISOR, SYNTHETIC_TRIGGER_THRESHOLD);
    }
  }

  /** Produce this frame's buffer, unless live external audio is in use. */
  advance(): void {
    if (this.config.type === "file" && this.externalAudioReceived) return;
    this.frameCount += 1;
    const buffer = synthesize(this.config.type, {
      level: this.config.level,
      frequency: this.config.frequency,
      frameIndex: this.frameCount,
      random: this.random,
    });
    this.publish(buffer, SYNTHETIC_PEAK_DIVISOR, SYNTHETIC_TRIGGER_THRESHOLD);
  }

  /**
   * Take a buffer of unsigned bytes (128 = silence) of any length,
   * stride-downsample it to 100 signed samples and make it current.
   * Empty or non-sequence input changes nothing.
   *
   * @returns Whether the input was accepted.
   */
  ingest(samples: unknown): boolean {
    if (!isSampleSequence(samples) || samples.length === 0) return false;
    this.externalAudioReceived = true;
    const step = Math.max(1, Math.floor(samples.length / AUDIO_BUFFER_SIZE));
    const buffer = Array.from({ length: AUDIO_BUFFER_SIZE }, (_, i) => {
      const idx = i * step;
      if (idx >= samples.length) return 0;
      const byte = Number(samples[idx]);
      return ((Number.isFinite(byte) ? byte : BYTE_SILENCE) - BYTE_SILENCE) * 256;
    });
    this.publish(buffer, EXTERNAL_PEAK_DIVISOR, EXTERNAL_TRIGGER_THRESHOLD);
    return true;
  }

  snapshot(): AudioSnapshot {
    return { ...this.config, frameCount: this.frameCount, externalAudioReceived: this.externalAudioReceived };
  }

  private publish(buffer: number[], divisor: number, threshold: number): void {
    const ctx = this.context;
    ctx.audioIn = buffer;
    ctx.audioLeft = buffer.slice();
    ctx.audioRight = buffer.slice();
    ctx.audioInR = buffer.slice();
    const peak = buffer.reduce((max, s) => Math.max(max, Math.abs(s)), 0) / divisor;
    ctx.audioPeak = peak;
    ctx.audioPeakR = peak;
    ctx.audioTrig = peak > threshold;
    ctx.trig = ctx.audioTrig;
  }
}
