import { describe, it, expect } from "vitest";
import { Rect, SRCALPHA, Surface } from "../src/index.js";

describe("Surface", () => {
  describe("construction", () => {
    it("starts black and opaque without alpha", () => {
      const s = new Surface([4, 3]);
      expect(s.getSize()).toEqual([4, 3]);
      expect(s.hasAlpha()).toBe(false);
      expect(s.getAt([0, 0])).toEqual([0, 0, 0, 255]);
    });

    it("starts transparent with SRCALPHA", () => {
      const s = new Surface([2, 2], SRCALPHA);
      expect(s.hasAlpha()).toBe(true);
      expect(s.getAt([1, 1])).toEqual([0, 0, 0, 0]);
    });

    it("rejects negative sizes", () => {
      expect(() => new Surface([-1, 4])).toThrow("Invalid resolution for Surface");
    });

    it("rejects pixel data of the wrong length", () => {
      expect(() => Surface.fromPixels(2, 2, 3, [1, 2, 3])).toThrow(
        "Pixel data length 3 does not match 2x2x3",
      );
    });
  });

  describe("fill / getAt / setAt", () => {
    it("fills every pixel", () => {
      const s = new Surface([4, 3]);
      s.fill([10, 20, 30]);
      expect(s.getAt([0, 0])).toEqual([10, 20, 30, 255]);
      expect(s.getAt([3, 2])).toEqual([10, 20, 30, 255]);
    });

    it("replaces prior content", () => {
      const s = new Surface([2, 2]);
      s.fill([255, 0, 0]);
      s.fill([0, 0, 255]);
      expect(s.getAt([1, 0])).toEqual([0, 0, 255, 255]);
    });

    it("reads opaque black outside the buffer", () => {
      const s = new Surface([4, 3]);
      s.fill([200, 200, 200]);
      expect(s.getAt([4, 0])).toEqual([0, 0, 0, 255]);
      expect(s.getAt([-1, 0])).toEqual([0, 0, 0, 255]);
      expect(s.getAt([0, 3])).toEqual([0, 0, 0, 255]);
    });

    it("takes alpha from the fourth channel only on RGBA surfaces", () => {
      const rgba = new Surface([2, 2], SRCALPHA);
      rgba.fill([1, 2, 3, 4]);
      expect(rgba.getAt([0, 1])).toEqual([1, 2, 3, 4]);

      const rgb = new Surface([2, 2]);
      rgb.fill([1, 2, 3, 4]);
      expect(rgb.getAt([0, 1])).toEqual([1, 2, 3, 255]);
    });

    it("clamps and truncates channel values", () => {
      const s = new Surface([1, 1]);
      s.fill([300, -5, 12.9]);
      expect(s.getAt([0, 0])).toEqual([255, 0, 12, 255]);
    });

    it("ignores malformed colors", () => {
      const s = new Surface([1, 1]);
      s.fill([9, 9, 9]);
      s.fill([1, 2]);
      expect(s.getAt([0, 0])).toEqual([9, 9, 9, 255]);
    });

    it("writes single pixels and ignores writes outside", () => {
      const s = new Surface([3, 3]);
      s.setAt([1, 2], [7, 8, 9]);
      s.setAt([5, 5], [7, 8, 9]);
      expect(s.getAt([1, 2])).toEqual([7, 8, 9, 255]);
      expect(s.getAt([2, 2])).toEqual([0, 0, 0, 255]);
    });
  });

  describe("blit", () => {
    it("composites by source alpha", () => {
      const dest = new Surface([4, 4]);
      dest.fill([100, 100, 100]);
      const src = new Surface([2, 1], SRCALPHA);
      src.setAt([0, 0], [255, 0, 0, 0]);
      src.setAt([1, 0], [0, 255, 0, 255]);

      const affected = dest.blit(src, [1, 1]);

      expect(dest.getAt([1, 1])).toEqual([100, 100, 100, 255]);
      expect(dest.getAt([2, 1])).toEqual([0, 255, 0, 255]);
      expect(affected.topleft).toEqual([1, 1]);
      expect(affected.size).toEqual([2, 1]);
    });

    it("blends partially transparent pixels", () => {
      const dest = new Surface([1, 1]);
      const src = new Surface([1, 1], SRCALPHA);
      src.fill([200, 0, 0, 128]);
      dest.blit(src, [0, 0]);
      expect(dest.getAt([0, 0])).toEqual([100, 0, 0, 255]);
    });

    it("copies only the requested source area", () => {
      const src = new Surface([4, 4]);
      src.setAt([2, 2], [9, 9, 9]);
      const dest = new Surface([4, 4]);
      dest.blit(src, [0, 0], [2, 2, 2, 2]);
      expect(dest.getAt([0, 0])).toEqual([9, 9, 9, 255]);
    });

    it("clips to the destination and reports the clipped rectangle", () => {
      const src = new Surface([2, 2]);
      src.fill([5, 5, 5]);
      const dest = new Surface([4, 4]);
      const affected = dest.blit(src, [-1, -1]);
      expect(dest.getAt([0, 0])).toEqual([5, 5, 5, 255]);
      expect(dest.getAt([1, 1])).toEqual([0, 0, 0, 255]);
      expect(affected.toString()).toBe("<rect(0, 0, 1, 1)>");
    });

    it("accepts a Rect as the position", () => {
      const src = new Surface([1, 1]);
      src.fill([1, 1, 1]);
      const dest = new Surface([4, 4]);
      dest.blit(src, new Rect(3, 2, 10, 10));
      expect(dest.getAt([3, 2])).toEqual([1, 1, 1, 255]);
    });

    it("handles overlapping self-blits", () => {
      const s = new Surface([3, 1]);
      s.setAt([0, 0], [1, 0, 0]);
      s.setAt([1, 0], [2, 0, 0]);
      s.setAt([2, 0], [3, 0, 0]);
      s.blit(s, [1, 0]);
      expect([0, 1, 2].map((x) => s.getAt([x, 0])[0])).toEqual([1, 1, 2]);
    });
  });

  describe("copies and conversion", () => {
    it("copies independently", () => {
      const s = new Surface([2, 2]);
      const c = s.copy();
      c.fill([1, 1, 1]);
      expect(s.getAt([0, 0])).toEqual([0, 0, 0, 255]);
    });

    it("converts between RGB and RGBA", () => {
      const s = new Surface([1, 1]);
      s.fill([4, 5, 6]);
      const withAlpha = s.convertAlpha();
      expect(withAlpha.hasAlpha()).toBe(true);
      expect(withAlpha.getAt([0, 0])).toEqual([4, 5, 6, 255]);
      expect(withAlpha.convert().hasAlpha()).toBe(false);
    });

    it("anchors its rect", () => {
      const s = new Surface([10, 4]);
      expect(s.getRect({ center: [50, 50] }).topleft).toEqual([45, 48]);
    });
  });
});
