import { describe, it, expect } from "vitest";
import { ExecutionContext, hueToRgb } from "../src/index.js";

describe("ExecutionContext", () => {
  it("starts with hardware defaults", () => {
    const ctx = new ExecutionContext();
    expect([ctx.xres, ctx.yres]).toEqual([1280, 720]);
    expect(ctx.mode).toBe("unknown");
    expect(ctx.audioIn).toHaveLength(100);
    expect(ctx.audioTrig).toBe(false);
    expect(ctx.knob3).toBe(0.5);
    expect(ctx.midiNotes).toHaveLength(128);
    expect(ctx.midiNote).toBe(60);
  });

  it("maps color picker values around the hue wheel", () => {
    const ctx = new ExecutionContext();
    expect(ctx.colorPickerBg(0)).toEqual([255, 0, 0]);
    expect(ctx.colorPickerBg(0.5)).toEqual([0, 255, 255]);
    expect(ctx.colorPicker(0.5)).toEqual([0, 255, 255]);
  });

  it("offsets the foreground picker by half a turn", () => {
    expect(new ExecutionContext().colorPickerFg(0)).toEqual([0, 255, 255]);
  });

  it("clamps picker input", () => {
    const ctx = new ExecutionContext();
    expect(ctx.colorPickerBg(2)).toEqual([255, 0, 0]);
    expect(ctx.colorPickerBg(-1)).toEqual([255, 0, 0]);
  });

  it("truncates intermediate channels", () => {
    // 90° sits half way through the second sector.
    expect(hueToRgb(90)).toEqual([127, 255, 0]);
  });
});
