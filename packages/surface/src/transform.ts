/**
 * Image transforms for the `gfx.transform` namespace.
 *
 * Every function returns a new surface with the source's channel layout and
 * leaves the source untouched.
 */

import { toPoint } from "./rect.js";
import type { PointLike } from "./rect.js";
import { SRCALPHA, Surface } from "./surface.js";

function blankLike(source: Surface, width: number, height: number): Surface {
  return new Surface([width, height], source.channels === 4 ? SRCALPHA : 0);
}

function targetSize(size: PointLike): [number, number] {
  const dims = toPoint(size);
  if (!dims || dims[0] < 0 || dims[1] < 0) {
    throw new Error("Cannot scale to negative size");
  }
  return [Math.trunc(dims[0]), Math.trunc(dims[1])];
}

/** Nearest-neighbour resize. */
export function scale(source: Surface, size: PointLike): Surface {
  const [width, height] = targetSize(size);
  const out = blankLike(source, width, height);
  if (source.width === 0 || source.height === 0) return out;
  const c = source.channels;
  for (let y = 0; y < height; y++) {
    const sy = Math.floor((y * source.height) / height);
    for (let x = 0; x < width; x++) {
      const sx = Math.floor((x * source.width) / width);
      const si = (sy * source.width + sx) * c;
      const di = (y * width + x) * c;
      for (let k = 0; k < c; k++) out.data[di + k] = source.data[si + k];
    }
  }
  return out;
}

// ---------------------------------------------------------------------------
// Smooth scaling
// ---------------------------------------------------------------------------

/** Contribution of one source sample to one output sample. */
interface Tap {
  readonly index: number;
  readonly weight: number;
}

/**
 * Per-output filter taps along one axis: a box filter when shrinking,
 * linear interpolation when enlarging.
 */
function axisTaps(srcLen: number, dstLen: number): Tap[][] {
  const taps: Tap[][] = [];
  const ratio = srcLen / dstLen;
  for (let i = 0; i < dstLen; i++) {
    if (srcLen > dstLen) {
      const start = i * ratio;
      const end = start + ratio;
      const row: Tap[] = [];
      for (let s = Math.floor(start); s < Math.min(srcLen, Math.ceil(end)); s++) {
        const overlap = Math.min(end, s + 1) - Math.max(start, s);
        if (overlap > 0) row.push({ index: s, weight: overlap / ratio });
      }
      taps.push(row);
    } else {
      const centre = (i + 0.5) * ratio - 0.5;
      const i0 = Math.max(0, Math.min(srcLen - 1, Math.floor(centre)));
      const i1 = Math.min(srcLen - 1, i0 + 1);
      const frac = Math.max(0, Math.min(1, centre - i0));
      taps.push(
        i0 === i1 || frac === 0
          ? [{ index: i0, weight: 1 }]
          : [
              { index: i0, weight: 1 - frac },
              { index: i1, weight: frac },
            ],
      );
    }
  }
  return taps;
}

/** Higher-quality resize: box-filtered when shrinking, bilinear when enlarging. */
export function smoothscale(source: Surface, size: PointLike): Surface {
  const [width, height] = targetSize(size);
  const out = blankLike(source, width, height);
  if (width === 0 || height === 0 || source.width === 0 || source.height === 0) return out;
  const c = source.channels;
  const xTaps = axisTaps(source.width, width);
  const yTaps = axisTaps(source.height, height);

  // Horizontal pass: source rows → intermediate (width × source.height).
  const mid = new Float64Array(width * source.height * c);
  for (let y = 0; y < source.height; y++) {
    for (let x = 0; x < width; x++) {
      const mi = (y * width + x) * c;
      for (const tap of xTaps[x]) {
        const si = (y * source.width + tap.index) * c;
        for (let k = 0; k < c; k++) mid[mi + k] += source.data[si + k] * tap.weight;
      }
    }
  }

  // Vertical pass: intermediate → output.
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const di = (y * width + x) * c;
      for (let k = 0; k < c; k++) {
        let acc = 0;
        for (const tap of yTaps[y]) acc += mid[(tap.index * width + x) * c + k] * tap.weight;
        out.data[di + k] = Math.round(acc);
      }
    }
  }
  return out;
}

// ---------------------------------------------------------------------------
// Rotation
// ---------------------------------------------------------------------------

function rotateQuarter(source: Surface, quarters: number): Surface {
  const { width: sw, height: sh, channels: c } = source;
  const swap = quarters % 2 === 1;
  const out = blankLike(source, swap ? sh : sw, swap ? sw : sh);
  for (let y = 0; y < out.height; y++) {
    for (let x = 0; x < out.width; x++) {
      let sx: number;
      let sy: number;
      if (quarters === 1) {
        sx = sw - 1 - y;
        sy = x;
      } else if (quarters === 2) {
        sx = sw - 1 - x;
        sy = sh - 1 - y;
      } else if (quarters === 3) {
        sx = y;
        sy = sh - 1 - x;
      } else {
        sx = x;
        sy = y;
      }
      const si = (sy * sw + sx) * c;
      const di = (y * out.width + x) * c;
      for (let k = 0; k < c; k++) out.data[di + k] = source.data[si + k];
    }
  }
  return out;
}

/**
 * Rotate counterclockwise by `angle` degrees.
 *
 * The canvas grows to hold the whole rotated image. Uncovered pixels are
 * black on RGB surfaces and transparent on RGBA ones. Multiples of 90° are
 * exact; other angles are sampled bilinearly.
 */
export function rotate(source: Surface, angle: number): Surface {
  const degrees = ((angle % 360) + 360) % 360;
  if (degrees % 90 === 0) return rotateQuarter(source, degrees / 90);

  const { width: sw, height: sh, channels: c } = source;
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.cos(rad);
  const sin = Math.sin(rad);
  const width = Math.ceil(Math.abs(sw * cos) + Math.abs(sh * sin) - 1e-9);
  const height = Math.ceil(Math.abs(sw * sin) + Math.abs(sh * cos) - 1e-9);
  const out = blankLike(source, width, height);
  if (sw === 0 || sh === 0) return out;

  for (let y = 0; y < height; y++) {
    const dy = y + 0.5 - height / 2;
    for (let x = 0; x < width; x++) {
      const dx = x + 0.5 - width / 2;
      const sx = cos * dx - sin * dy + sw / 2 - 0.5;
      const sy = sin * dx + cos * dy + sh / 2 - 0.5;
      if (sx < -0.5 || sy < -0.5 || sx > sw - 0.5 || sy > sh - 0.5) continue;

      const x0 = Math.max(0, Math.min(sw - 1, Math.floor(sx)));
      const y0 = Math.max(0, Math.min(sh - 1, Math.floor(sy)));
      const x1 = Math.min(sw - 1, x0 + 1);
      const y1 = Math.min(sh - 1, y0 + 1);
      const fx = Math.max(0, Math.min(1, sx - x0));
      const fy = Math.max(0, Math.min(1, sy - y0));
      const i00 = (y0 * sw + x0) * c;
      const i10 = (y0 * sw + x1) * c;
      const i01 = (y1 * sw + x0) * c;
      const i11 = (y1 * sw + x1) * c;
      const di = (y * width + x) * c;
      for (let k = 0; k < c; k++) {
        const top = source.data[i00 + k] * (1 - fx) + source.data[i10 + k] * fx;
        const bottom = source.data[i01 + k] * (1 - fx) + source.data[i11 + k] * fx;
        out.data[di + k] = Math.round(top * (1 - fy) + bottom * fy);
      }
    }
  }
  return out;
}

/** Mirror horizontally (`flipX`) and/or vertically (`flipY`). */
export function flip(source: Surface, flipX: boolean, flipY: boolean): Surface {
  const { width, height, channels: c } = source;
  const out = blankLike(source, width, height);
  for (let y = 0; y < height; y++) {
    const sy = flipY ? height - 1 - y : y;
    for (let x = 0; x < width; x++) {
      const sx = flipX ? width - 1 - x : x;
      const si = (sy * width + sx) * c;
      const di = (y * width + x) * c;
      for (let k = 0; k < c; k++) out.data[di + k] = source.data[si + k];
    }
  }
  return out;
}
