/**
 * Color values as modes pass them: any sequence of at least three numbers.
 *
 * Only the first three channels reach the pixel buffer for shape drawing.
 * A fourth channel is read by `fill` and `setAt` on surfaces that carry alpha.
 */

/** Anything indexable with at least three numeric channels. */
export type ColorLike = ArrayLike<number>;

/** An opaque RGB triple, each channel an integer in 0..255. */
export type Rgb = readonly [number, number, number];

/** RGB plus alpha, each channel an integer in 0..255. */
export type Rgba = readonly [number, number, number, number];

/** Truncate toward zero and clamp to a byte. NaN maps to 0. */
export function toChannel(value: number): number {
  const n = Math.trunc(Number(value));
  if (Number.isNaN(n) || n < 0) return 0;
  return n > 255 ? 255 : n;
}

function isColorLike(color: unknown): color is ColorLike {
  if (color === null || typeof color !== "object" || !("length" in color)) {
    return false;
  }
  return typeof color.length === "number" && color.length >= 3;
}

/**
 * Normalise a color to an RGB triple.
 * Returns `null` for anything that is not a sequence of three or more values.
 */
export function toRgb(color: unknown): Rgb | null {
  if (!isColorLike(color)) return null;
  return [toChannel(color[0]), toChannel(color[1]), toChannel(color[2])];
}

/** Like {@link toRgb}, with the fourth channel read as alpha (default 255). */
export function toRgba(color: unknown): Rgba | null {
  if (!isColorLike(color)) return null;
  const alpha = color.length >= 4 ? toChannel(color[3]) : 255;
  return [toChannel(color[0]), toChannel(color[1]), toChannel(color[2]), alpha];
}
