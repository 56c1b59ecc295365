/**
 * Surface: an in-memory RGB or RGBA pixel buffer.
 *
 * Every operation clips silently to the buffer bounds: out-of-range
 * coordinates never throw. Drawing primitives live in `draw.ts` and write
 * through {@link Surface.plot} and {@link Surface.span}.
 */

import { toRgb, toRgba } from "./color.js";
import type { ColorLike, Rgb, Rgba } from "./color.js";
import { Rect, toPoint, toRect } from "./rect.js";
import type { PointLike, RectAnchor, RectLike } from "./rect.js";

/** Surface flag: allocate a per-pixel alpha channel. */
export const SRCALPHA = 0x00010000;

/** Opaque black, returned by reads outside the buffer. */
const OUTSIDE: Rgba = [0, 0, 0, 255];

export class Surface {
  readonly width: number;
  readonly height: number;
  /** 3 for RGB, 4 for RGBA. */
  readonly channels: 3 | 4;
  /** Row-major pixel data, `channels` bytes per pixel. */
  readonly data: Uint8ClampedArray;

  /**
   * @param size - `[width, height]` in pixels.
   * @param flags - {@link SRCALPHA} for a transparent RGBA surface; RGB (black) otherwise.
   */
  constructor(size: PointLike, flags = 0) {
    const dims = toPoint(size);
    if (!dims || dims[0] < 0 || dims[1] < 0) {
      throw new Error("Invalid resolution for Surface");
    }
    this.width = Math.trunc(dims[0]);
    this.height = Math.trunc(dims[1]);
    this.channels = (flags & SRCALPHA) !== 0 ? 4 : 3;
    this.data = new Uint8ClampedArray(this.width * this.height * this.channels);
  }

  /** Wrap existing pixel data (copied) in a new surface. */
  static fromPixels(
    width: number,
    height: number,
    channels: 3 | 4,
    pixels: ArrayLike<number>,
  ): Surface {
    const surface = new Surface([width, height], channels === 4 ? SRCALPHA : 0);
    if (pixels.length !== surface.data.length) {
      throw new Error(
        `Pixel data length ${pixels.length} does not match ${width}x${height}x${channels}`,
      );
    }
    surface.data.set(pixels);
    return surface;
  }

  getWidth(): number {
    return this.width;
  }

  getHeight(): number {
    return this.height;
  }

  getSize(): [number, number] {
    return [this.width, this.height];
  }

  hasAlpha(): boolean {
    return this.channels === 4;
  }

  /**
   * Bounds of this surface at the origin, optionally re-anchored.
   *
   * @example
   * ```js
   * screen.blit(logo, logo.getRect({ center: screen.getRect().center }));
   * ```
   */
  getRect(anchor?: RectAnchor): Rect {
    const rect = new Rect(0, 0, this.width, this.height);
    return anchor ? rect.anchor(anchor) : rect;
  }

  /**
   * Replace every pixel with a solid color. Prior content is discarded.
   * On RGBA surfaces a fourth color channel sets the alpha.
   */
  fill(color: ColorLike): Rect {
    if (this.channels === 4) {
      const rgba = toRgba(color);
      if (rgba) {
        for (let i = 0; i < this.data.length; i += 4) {
          this.data[i] = rgba[0];
          this.data[i + 1] = rgba[1];
          this.data[i + 2] = rgba[2];
          this.data[i + 3] = rgba[3];
        }
      }
    } else {
      const rgb = toRgb(color);
      if (rgb) {
        for (let i = 0; i < this.data.length; i += 3) {
          this.data[i] = rgb[0];
          this.data[i + 1] = rgb[1];
          this.data[i + 2] = rgb[2];
        }
      }
    }
    return this.getRect();
  }

  /** Read one pixel as `[r, g, b, a]`; opaque black outside the buffer. */
  getAt(position: PointLike): [number, number, number, number] {
    const point = toPoint(position);
    if (!point) return [...OUTSIDE];
    const x = Math.trunc(point[0]);
    const y = Math.trunc(point[1]);
    if (!this.contains(x, y)) return [...OUTSIDE];
    const i = (y * this.width + x) * this.channels;
    const alpha = this.channels === 4 ? this.data[i + 3] : 255;
    return [this.data[i], this.data[i + 1], this.data[i + 2], alpha];
  }

  /** Write one pixel. Outside the buffer or with a malformed color: no-op. */
  setAt(position: PointLike, color: ColorLike): void {
    const point = toPoint(position);
    const rgba = toRgba(color);
    if (!point || !rgba) return;
    const x = Math.trunc(point[0]);
    const y = Math.trunc(point[1]);
    if (!this.contains(x, y)) return;
    const i = (y * this.width + x) * this.channels;
    this.data[i] = rgba[0];
    this.data[i + 1] = rgba[1];
    this.data[i + 2] = rgba[2];
    if (this.channels === 4) this.data[i + 3] = rgba[3];
  }

  /**
   * Copy pixels from `source` onto this surface at an integer position.
   *
   * With `area`, only that sub-rectangle of the source is copied. An RGBA
   * source composites by its alpha (0 keeps the destination, 255 replaces
   * it); an RGB source overwrites.
   *
   * @returns The affected rectangle, in this surface's coordinates.
   */
  blit(source: Surface, position: PointLike | RectLike, area?: RectLike | null): Rect {
    const origin = toPoint(position) ?? toRect(position)?.topleft ?? [0, 0];
    const destX = Math.trunc(origin[0]);
    const destY = Math.trunc(origin[1]);

    if (area !== undefined && area !== null) {
      const requested = toRect(area);
      if (!requested) return new Rect(destX, destY, 0, 0);
      const srcArea = requested.clip(source.getRect());
      // Clipping the source moves the paste origin by the same amount.
      const shiftX = srcArea.x - requested.x;
      const shiftY = srcArea.y - requested.y;
      return this.copyRegion(source, srcArea, destX + shiftX, destY + shiftY);
    }
    return this.copyRegion(source, source.getRect(), destX, destY);
  }

  /** A deep copy with the same channel layout. */
  copy(): Surface {
    return Surface.fromPixels(this.width, this.height, this.channels, this.data);
  }

  /** An RGB copy; alpha is dropped. */
  convert(): Surface {
    return this.withChannels(3);
  }

  /** An RGBA copy; RGB pixels become fully opaque. */
  convertAlpha(): Surface {
    return this.withChannels(4);
  }

  contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  /** Write an opaque pixel; silently clipped. */
  plot(x: number, y: number, rgb: Rgb): void {
    if (!this.contains(x, y)) return;
    const i = (y * this.width + x) * this.channels;
    this.data[i] = rgb[0];
    this.data[i + 1] = rgb[1];
    this.data[i + 2] = rgb[2];
    if (this.channels === 4) this.data[i + 3] = 255;
  }

  /**
   * Write an opaque horizontal run `x0..x1` inclusive on row `y`; silently
   * clipped. An inverted run (`x1 < x0`) writes nothing.
   */
  span(x0: number, x1: number, y: number, rgb: Rgb): void {
    if (y < 0 || y >= this.height) return;
    const start = Math.max(0, x0);
    const end = Math.min(this.width - 1, x1);
    const stride = this.channels;
    for (let x = start; x <= end; x++) {
      const i = (y * this.width + x) * stride;
      this.data[i] = rgb[0];
      this.data[i + 1] = rgb[1];
      this.data[i + 2] = rgb[2];
      if (stride === 4) this.data[i + 3] = 255;
    }
  }

  private copyRegion(source: Surface, area: Rect, destX: number, destY: number): Rect {
    const target = new Rect(destX, destY, area.width, area.height).clip(this.getRect());
    if (target.width <= 0 || target.height <= 0) {
      return new Rect(destX, destY, 0, 0);
    }
    const offsetX = area.x - destX;
    const offsetY = area.y - destY;
    // Self-blits read from a snapshot so overlapping regions copy correctly.
    const src = source === this ? source.data.slice() : source.data;
    const dst = this.data;
    const sc = source.channels;
    const dc = this.channels;

    for (let y = target.top; y < target.bottom; y++) {
      for (let x = target.left; x < target.right; x++) {
        const si = ((y + offsetY) * source.width + (x + offsetX)) * sc;
        const di = (y * this.width + x) * dc;
        const alpha = sc === 4 ? src[si + 3] : 255;
        if (alpha === 0) continue;
        if (alpha === 255) {
          dst[di] = src[si];
          dst[di + 1] = src[si + 1];
          dst[di + 2] = src[si + 2];
          if (dc === 4) dst[di + 3] = 255;
          continue;
        }
        const inv = 255 - alpha;
        dst[di] = Math.round((src[si] * alpha + dst[di] * inv) / 255);
        dst[di + 1] = Math.round((src[si + 1] * alpha + dst[di + 1] * inv) / 255);
        dst[di + 2] = Math.round((src[si + 2] * alpha + dst[di + 2] * inv) / 255);
        if (dc === 4) {
          dst[di + 3] = Math.round(alpha + (dst[di + 3] * inv) / 255);
        }
      }
    }
    return target;
  }

  private withChannels(channels: 3 | 4): Surface {
    const out = new Surface([this.width, this.height], channels === 4 ? SRCALPHA : 0);
    const count = this.width * this.height;
    for (let p = 0; p < count; p++) {
      const si = p * this.channels;
      const di = p * channels;
      out.data[di] = this.data[si];
      out.data[di + 1] = this.data[si + 1];
      out.data[di + 2] = this.data[si + 2];
      if (channels === 4) {
        out.data[di + 3] = this.channels === 4 ? this.data[si + 3] : 255;
      }
    }
    return out;
  }
}
