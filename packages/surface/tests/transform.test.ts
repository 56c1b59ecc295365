import { describe, it, expect } from "vitest";
import { SRCALPHA, Surface, transform } from "../src/index.js";

function rowOf(s: Surface, y = 0): number[] {
  return Array.from({ length: s.width }, (_, x) => s.getAt([x, y])[0]);
}

describe("transform.scale", () => {
  it("resizes with nearest-neighbour sampling", () => {
    const s = new Surface([2, 2]);
    s.setAt([0, 0], [10, 0, 0]);
    s.setAt([1, 0], [20, 0, 0]);
    s.setAt([0, 1], [30, 0, 0]);
    s.setAt([1, 1], [40, 0, 0]);

    const big = transform.scale(s, [4, 4]);

    expect(big.getSize()).toEqual([4, 4]);
    expect(rowOf(big, 0)).toEqual([10, 10, 20, 20]);
    expect(big.getAt([3, 3])[0]).toBe(40);
    expect(big.getAt([1, 2])[0]).toBe(30);
  });

  it("keeps the alpha channel", () => {
    expect(transform.scale(new Surface([2, 2], SRCALPHA), [3, 3]).hasAlpha()).toBe(true);
  });

  it("rejects negative sizes", () => {
    expect(() => transform.scale(new Surface([2, 2]), [-1, 2])).toThrow("Cannot scale to negative size");
  });
});

describe("transform.smoothscale", () => {
  it("averages source pixels when shrinking", () => {
    const s = new Surface([2, 1]);
    s.setAt([1, 0], [255, 255, 255]);
    expect(transform.smoothscale(s, [1, 1]).getAt([0, 0])).toEqual([128, 128, 128, 255]);
  });

  it("keeps a solid color solid when enlarging", () => {
    const s = new Surface([3, 2]);
    s.fill([40, 80, 120]);
    const big = transform.smoothscale(s, [7, 5]);
    expect(big.getAt([0, 0])).toEqual([40, 80, 120, 255]);
    expect(big.getAt([6, 4])).toEqual([40, 80, 120, 255]);
    expect(big.getAt([3, 2])).toEqual([40, 80, 120, 255]);
  });
});

describe("transform.rotate", () => {
  it("rotates a quarter turn counterclockwise exactly", () => {
    const s = new Surface([3, 2]);
    s.setAt([2, 0], [255, 0, 0]);
    const r = transform.rotate(s, 90);
    expect(r.getSize()).toEqual([2, 3]);
    expect(r.getAt([0, 0])).toEqual([255, 0, 0, 255]);
  });

  it("treats -90 as a quarter turn clockwise", () => {
    const s = new Surface([3, 2]);
    s.setAt([2, 0], [255, 0, 0]);
    const r = transform.rotate(s, -90);
    expect(r.getAt([1, 2])).toEqual([255, 0, 0, 255]);
  });

  it("turns a half turn", () => {
    const s = new Surface([3, 1]);
    s.setAt([0, 0], [9, 0, 0]);
    expect(rowOf(transform.rotate(s, 180))).toEqual([0, 0, 9]);
  });

  it("expands the canvas for other angles and leaves corners black", () => {
    const s = new Surface([10, 10]);
    s.fill([255, 255, 255]);
    const r = transform.rotate(s, 45);
    expect(r.getSize()).toEqual([15, 15]);
    expect(r.getAt([0, 0])).toEqual([0, 0, 0, 255]);
    expect(r.getAt([7, 7])).toEqual([255, 255, 255, 255]);
  });

  it("leaves uncovered pixels transparent on RGBA surfaces", () => {
    const s = new Surface([10, 10], SRCALPHA);
    s.fill([255, 255, 255, 255]);
    expect(transform.rotate(s, 30).getAt([0, 0])).toEqual([0, 0, 0, 0]);
  });
});

describe("transform.flip", () => {
  it("mirrors horizontally", () => {
    const s = new Surface([3, 1]);
    s.setAt([0, 0], [1, 0, 0]);
    s.setAt([1, 0], [2, 0, 0]);
    s.setAt([2, 0], [3, 0, 0]);
    expect(rowOf(transform.flip(s, true, false))).toEqual([3, 2, 1]);
    expect(rowOf(s)).toEqual([1, 2, 3]);
  });

  it("mirrors vertically", () => {
    const s = new Surface([1, 2]);
    s.setAt([0, 0], [5, 0, 0]);
    expect(transform.flip(s, false, true).getAt([0, 1])[0]).toBe(5);
  });
});
