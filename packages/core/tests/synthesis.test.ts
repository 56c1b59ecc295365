import { describe, it, expect } from "vitest";
import { synthesize } from "../src/index.js";
import type { SynthesisParams } from "../src/index.js";

function params(overrides: Partial<SynthesisParams> = {}): SynthesisParams {
  return { level: 1, frequency: 441, frameIndex: 0, random: () => 0.5, ...overrides };
}

describe("synthesize", () => {
  it("always returns 100 samples", () => {
    for (const type of ["sine", "noise", "beat", "silence", "file", "square"]) {
      expect(synthesize(type, params())).toHaveLength(100);
    }
  });

  it("produces silence", () => {
    expect(synthesize("silence", params()).every((s) => s === 0)).toBe(true);
  });

  it("produces a sine at full scale", () => {
    // 441 Hz at 44.1 kHz is exactly one cycle per 100 samples.
    const buffer = synthesize("sine", params());
    expect(buffer[0]).toBe(0);
    expect(buffer[25]).toBeCloseTo(32767, 3);
    expect(buffer[75]).toBeCloseTo(-32767, 3);
  });

  it("keeps phase continuous across frames", () => {
    const next = synthesize("sine", params({ frameIndex: 1, frequency: 220.5 }));
    // Sample 0 of frame 1 is sample 100 overall: half a cycle at 220.5 Hz.
    expect(next[0]).toBeCloseTo(0, 6);
    expect(next[50]).toBeCloseTo(32767 * Math.sin(2 * Math.PI * 220.5 * (150 / 44100)), 6);
  });

  it("scales by level", () => {
    expect(synthesize("sine", params({ level: 0 })).every((s) => s === 0)).toBe(true);
    expect(synthesize("sine", params({ level: 0.5 }))[25]).toBeCloseTo(16383.5, 3);
  });

  it("draws noise uniformly between -amplitude and +amplitude", () => {
    expect(synthesize("noise", params({ random: () => 0 }))[0]).toBe(-32767);
    expect(synthesize("noise", params({ random: () => 0.5 }))[0]).toBe(0);
    expect(synthesize("noise", params({ level: 0.5, random: () => 0.75 }))[0]).toBeCloseTo(8191.75, 6);
  });

  it("puts the beat in the first tenth of each half-second cycle", () => {
    const onBeat = synthesize("beat", params({ frameIndex: 0 }));
    expect(Math.max(...onBeat.map(Math.abs))).toBeGreaterThan(0);
    // Frame 100 starts 0.2268 s in, well past the kick.
    expect(synthesize("beat", params({ frameIndex: 100 })).every((s) => s === 0)).toBe(true);
  });

  it("falls back to the sine for file and unknown types", () => {
    const sine = synthesize("sine", params({ frameIndex: 3 }));
    expect(synthesize("file", params({ frameIndex: 3 }))).toEqual(sine);
    expect(synthesize("square", params({ frameIndex: 3 }))).toEqual(sine);
  });
});
