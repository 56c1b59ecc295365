/**
 * JPEG encoding of surfaces, used to ship rendered frames to clients.
 */

import jpeg from "jpeg-js";
import type { Surface } from "./surface.js";

export const DEFAULT_JPEG_QUALITY = 85;

/** Expand a surface to the 4-byte-per-pixel layout the codecs take. Alpha is forced opaque. */
export function toRgbaBuffer(surface: Surface, keepAlpha = false): Buffer {
  const count = surface.width * surface.height;
  const out = Buffer.alloc(count * 4);
  const c = surface.channels;
  for (let p = 0; p < count; p++) {
    out[p * 4] = surface.data[p * c];
    out[p * 4 + 1] = surface.data[p * c + 1];
    out[p * 4 + 2] = surface.data[p * c + 2];
    out[p * 4 + 3] = keepAlpha && c === 4 ? surface.data[p * c + 3] : 255;
  }
  return out;
}

export function encodeJpeg(surface: Surface, quality = DEFAULT_JPEG_QUALITY): Buffer {
  const q = Math.max(1, Math.min(100, Math.round(quality)));
  const encoded = jpeg.encode(
    { width: surface.width, height: surface.height, data: toRgbaBuffer(surface) },
    q,
  );
  return encoded.data;
}

/** `data:image/jpeg;base64,...` form of {@link encodeJpeg}. */
export function encodeJpegDataUri(surface: Surface, quality = DEFAULT_JPEG_QUALITY): string {
  return `data:image/jpeg;base64,${encodeJpeg(surface, quality).toString("base64")}`;
}
