/**
 * Dense pixel arrays for modes that want direct numeric access
 * (the `gfx.surfarray` namespace).
 *
 * Layout is row-major `(y, x, channel)`, the same order as the surface
 * buffer, so conversions in both directions are lossless.
 */

import { SRCALPHA, Surface } from "./surface.js";

export interface PixelArray {
  readonly width: number;
  readonly height: number;
  readonly channels: 3 | 4;
  readonly data: Uint8ClampedArray;
}

function extract(surface: Surface, channels: 3 | 4): PixelArray {
  const count = surface.width * surface.height;
  if (surface.channels === channels) {
    return { width: surface.width, height: surface.height, channels, data: surface.data.slice() };
  }
  const data = new Uint8ClampedArray(count * channels);
  for (let p = 0; p < count; p++) {
    const si = p * surface.channels;
    const di = p * channels;
    data[di] = surface.data[si];
    data[di + 1] = surface.data[si + 1];
    data[di + 2] = surface.data[si + 2];
    if (channels === 4) data[di + 3] = 255;
  }
  return { width: surface.width, height: surface.height, channels, data };
}

/** RGB copy of the surface's pixels. */
export function array3d(surface: Surface): PixelArray {
  return extract(surface, 3);
}

/** RGBA copy of the surface's pixels; RGB surfaces read as fully opaque. */
export function arrayRgba(surface: Surface): PixelArray {
  return extract(surface, 4);
}

/** New surface from an array; four channels give an RGBA surface. */
export function makeSurface(array: PixelArray): Surface {
  return Surface.fromPixels(array.width, array.height, array.channels, array.data);
}

/**
 * Copy an array's pixels into an existing surface of the same size.
 * A 4-channel array written to an RGB surface drops its alpha; a 3-channel
 * array written to an RGBA surface leaves alpha as it was.
 */
export function blitArray(surface: Surface, array: PixelArray): void {
  if (array.width !== surface.width || array.height !== surface.height) {
    throw new Error(
      `Array size ${array.width}x${array.height} does not match surface ${surface.width}x${surface.height}`,
    );
  }
  if (array.channels === surface.channels) {
    surface.data.set(array.data);
    return;
  }
  const count = surface.width * surface.height;
  for (let p = 0; p < count; p++) {
    const si = p * array.channels;
    const di = p * surface.channels;
    surface.data[di] = array.data[si];
    surface.data[di + 1] = array.data[si + 1];
    surface.data[di + 2] = array.data[si + 2];
  }
}

/** Blank array of the given size, for building images from scratch. */
export function createArray(width: number, height: number, channels: 3 | 4 = 3): PixelArray {
  const surface = new Surface([width, height], channels === 4 ? SRCALPHA : 0);
  return { width, height, channels, data: surface.data };
}
