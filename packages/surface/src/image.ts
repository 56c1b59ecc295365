/**
 * Image file IO for the `gfx.image` namespace.
 *
 * Loading is synchronous so modes can call it from `setup()`. A file that
 * cannot be read or decoded logs a warning and yields a 1×1 black surface
 * instead of throwing, so a missing asset never stops a mode from running.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { extname } from "node:path";
import jpeg from "jpeg-js";
import { PNG } from "pngjs";
import { toRgbaBuffer } from "./encode.js";
import { Surface } from "./surface.js";

const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47];
const JPEG_MAGIC = [0xff, 0xd8];

const SAVE_JPEG_QUALITY = 90;

function startsWith(bytes: Uint8Array, magic: readonly number[]): boolean {
  return magic.every((b, i) => bytes[i] === b);
}

/** RGBA bytes to a surface; RGBA only when some pixel is not fully opaque. */
function fromRgba(width: number, height: number, rgba: Uint8Array): Surface {
  const count = width * height;
  let opaque = true;
  for (let p = 0; p < count; p++) {
    if (rgba[p * 4 + 3] !== 255) {
      opaque = false;
      break;
    }
  }
  if (!opaque) return Surface.fromPixels(width, height, 4, rgba.subarray(0, count * 4));
  const rgb = new Uint8ClampedArray(count * 3);
  for (let p = 0; p < count; p++) {
    rgb[p * 3] = rgba[p * 4];
    rgb[p * 3 + 1] = rgba[p * 4 + 1];
    rgb[p * 3 + 2] = rgba[p * 4 + 2];
  }
  return Surface.fromPixels(width, height, 3, rgb);
}

function decode(bytes: Buffer): Surface {
  if (startsWith(bytes, PNG_MAGIC)) {
    const png = PNG.sync.read(bytes);
    return fromRgba(png.width, png.height, png.data);
  }
  if (startsWith(bytes, JPEG_MAGIC)) {
    const img = jpeg.decode(bytes, { useTArray: true, formatAsRGBA: true });
    const count = img.width * img.height;
    const rgb = new Uint8ClampedArray(count * 3);
    for (let p = 0; p < count; p++) {
      rgb[p * 3] = img.data[p * 4];
      rgb[p * 3 + 1] = img.data[p * 4 + 1];
      rgb[p * 3 + 2] = img.data[p * 4 + 2];
    }
    return Surface.fromPixels(img.width, img.height, 3, rgb);
  }
  throw new Error("unsupported image format");
}

/** Load a PNG or JPEG file, detected by content rather than extension. */
export function load(path: string): Surface {
  try {
    return decode(readFileSync(path));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`[vidsynth:image] Could not load image '${path}': ${message}`);
    return new Surface([1, 1]);
  }
}

/** Write a surface as PNG or JPEG, chosen by the file extension. */
export function save(surface: Surface, path: string): void {
  const ext = extname(path).toLowerCase();
  if (ext === ".png") {
    const png = new PNG({ width: surface.width, height: surface.height });
    toRgbaBuffer(surface, true).copy(png.data);
    writeFileSync(path, PNG.sync.write(png));
    return;
  }
  if (ext === ".jpg" || ext === ".jpeg") {
    const encoded = jpeg.encode(
      { width: surface.width, height: surface.height, data: toRgbaBuffer(surface) },
      SAVE_JPEG_QUALITY,
    );
    writeFileSync(path, encoded.data);
    return;
  }
  throw new Error(`Unsupported image extension '${ext}'`);
}
