/**
 * Text rendering for the `gfx.font` namespace.
 *
 * Two backends share one renderer: the built-in 8×8 bitmap font (glyphs in
 * `assets/font-8x8.json`) and TrueType/OpenType outlines parsed with
 * opentype.js and filled by the scanline rasterizer. Both produce a coverage
 * grid that is cropped to its ink and composited into a fresh surface.
 */

import { readFileSync } from "node:fs";
import opentype from "opentype.js";
import type { Font as FontFace, Path } from "opentype.js";
import { toRgb } from "./color.js";
import type { ColorLike, Rgb } from "./color.js";
import { fillContours } from "./raster.js";
import type { Contour } from "./raster.js";
import { SRCALPHA, Surface } from "./surface.js";

/** Coverage in 0..1 per pixel, row-major. */
interface Coverage {
  readonly width: number;
  readonly height: number;
  readonly values: Float32Array;
}

interface BitmapGlyphs {
  readonly firstCode: number;
  readonly width: number;
  readonly height: number;
  readonly glyphs: readonly (readonly number[])[];
}

/** Supersampling factor per axis for antialiased outline text. */
const SUPERSAMPLE = 4;

/** Tolerance, in pixels, when flattening Bézier curves. */
const FLATNESS = 0.25;

let bitmapGlyphs: BitmapGlyphs | null = null;

function isBitmapGlyphs(value: unknown): value is BitmapGlyphs {
  if (typeof value !== "object" || value === null) return false;
  if (!("firstCode" in value) || !("width" in value) || !("height" in value) || !("glyphs" in value)) {
    return false;
  }
  return (
    typeof value.firstCode === "number" &&
    typeof value.width === "number" &&
    typeof value.height === "number" &&
    Array.isArray(value.glyphs) &&
    value.glyphs.every((g: unknown) => Array.isArray(g) && g.every((row: unknown) => typeof row === "number"))
  );
}

function loadBitmapGlyphs(): BitmapGlyphs {
  if (bitmapGlyphs) return bitmapGlyphs;
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../assets/font-8x8.json", import.meta.url), "utf8"),
  );
  if (!isBitmapGlyphs(raw)) {
    throw new Error("Built-in font data is malformed");
  }
  bitmapGlyphs = raw;
  return raw;
}

function emptyCoverage(): Coverage {
  return { width: 0, height: 0, values: new Float32Array(0) };
}

// ---------------------------------------------------------------------------
// Backends
// ---------------------------------------------------------------------------

interface GlyphBackend {
  readonly lineHeight: number;
  coverage(text: string, antialias: boolean): Coverage;
}

class BitmapBackend implements GlyphBackend {
  readonly lineHeight: number;

  constructor(private readonly scale: number) {
    this.lineHeight = loadBitmapGlyphs().height * scale;
  }

  coverage(text: string): Coverage {
    const font = loadBitmapGlyphs();
    const chars = Array.from(text);
    const cell = font.width * this.scale;
    const width = chars.length * cell;
    const height = font.height * this.scale;
    const values = new Float32Array(width * height);
    chars.forEach((ch, index) => {
      const glyph = font.glyphs[(ch.codePointAt(0) ?? 0) - font.firstCode];
      if (!glyph) return;
      for (let row = 0; row < font.height; row++) {
        const bits = glyph[row] ?? 0;
        for (let col = 0; col < font.width; col++) {
          if ((bits & (0x80 >> col)) === 0) continue;
          for (let sy = 0; sy < this.scale; sy++) {
            const y = row * this.scale + sy;
            const x0 = index * cell + col * this.scale;
            values.fill(1, y * width + x0, y * width + x0 + this.scale);
          }
        }
      }
    });
    return { width, height, values };
  }
}

/** Flatten an opentype path into closed polygon contours. */
function flatten(path: Path): Contour[] {
  const contours: Contour[] = [];
  let current: number[] = [];
  let x = 0;
  let y = 0;
  const close = (): void => {
    if (current.length >= 6) contours.push(current);
    current = [];
  };
  const curve = (points: (t: number) => [number, number], length: number): void => {
    const steps = Math.max(1, Math.ceil(Math.sqrt(length / FLATNESS)));
    for (let i = 1; i <= steps; i++) current.push(...points(i / steps));
  };

  for (const cmd of path.commands) {
    switch (cmd.type) {
      case "M":
        close();
        current.push(cmd.x, cmd.y);
        break;
      case "L":
        current.push(cmd.x, cmd.y);
        break;
      case "Q": {
        const [x0, y0] = [x, y];
        const length = Math.hypot(cmd.x1 - x0, cmd.y1 - y0) + Math.hypot(cmd.x - cmd.x1, cmd.y - cmd.y1);
        curve((t) => {
          const u = 1 - t;
          return [u * u * x0 + 2 * u * t * cmd.x1 + t * t * cmd.x, u * u * y0 + 2 * u * t * cmd.y1 + t * t * cmd.y];
        }, length);
        break;
      }
      case "C": {
        const [x0, y0] = [x, y];
        const length =
          Math.hypot(cmd.x1 - x0, cmd.y1 - y0) +
          Math.hypot(cmd.x2 - cmd.x1, cmd.y2 - cmd.y1) +
          Math.hypot(cmd.x - cmd.x2, cmd.y - cmd.y2);
        curve((t) => {
          const u = 1 - t;
          const a = u * u * u;
          const b = 3 * u * u * t;
          const c = 3 * u * t * t;
          const d = t * t * t;
          return [
            a * x0 + b * cmd.x1 + c * cmd.x2 + d * cmd.x,
            a * y0 + b * cmd.y1 + c * cmd.y2 + d * cmd.y,
          ];
        }, length);
        break;
      }
      case "Z":
        close();
        break;
    }
    if (cmd.type !== "Z") {
      x = cmd.x;
      y = cmd.y;
    }
  }
  close();
  return contours;
}

class OutlineBackend implements GlyphBackend {
  readonly lineHeight: number;

  constructor(
    private readonly face: FontFace,
    private readonly size: number,
  ) {
    const unit = size / face.unitsPerEm;
    this.lineHeight = Math.ceil((face.ascender - face.descender) * unit);
  }

  coverage(text: string, antialias: boolean): Coverage {
    const ss = antialias ? SUPERSAMPLE : 1;
    const path = this.face.getPath(text, 0, 0, this.size * ss);
    const box = path.getBoundingBox();
    if (!Number.isFinite(box.x1) || !Number.isFinite(box.y1) || box.x2 <= box.x1 || box.y2 <= box.y1) {
      return emptyCoverage();
    }

    // Align the mask origin to whole output pixels.
    const originX = Math.floor(box.x1 / ss) * ss;
    const originY = Math.floor(box.y1 / ss) * ss;
    const width = Math.ceil((box.x2 - originX) / ss);
    const height = Math.ceil((box.y2 - originY) / ss);
    const mask = new Surface([width * ss, height * ss]);
    const contours = flatten(path).map((contour) =>
      contour.map((v, i) => (i % 2 === 0 ? v - originX : v - originY)),
    );
    fillContours(mask, [255, 255, 255], contours, "nonzero");

    const values = new Float32Array(width * height);
    const samples = ss * ss;
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        let hits = 0;
        for (let sy = 0; sy < ss; sy++) {
          for (let sx = 0; sx < ss; sx++) {
            if (mask.data[((y * ss + sy) * mask.width + x * ss + sx) * 3] !== 0) hits++;
          }
        }
        values[y * width + x] = hits / samples;
      }
    }
    return { width, height, values };
  }
}

// ---------------------------------------------------------------------------
// Compositing
// ---------------------------------------------------------------------------

interface InkBox {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

function inkBox(cov: Coverage): InkBox | null {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -1;
  let maxY = -1;
  for (let y = 0; y < cov.height; y++) {
    for (let x = 0; x < cov.width; x++) {
      if (cov.values[y * cov.width + x] <= 0) continue;
      if (x < minX) minX = x;
      if (x > maxX) maxX = x;
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }
  if (maxX < 0) return null;
  return { x: minX, y: minY, width: maxX - minX + 1, height: maxY - minY + 1 };
}

function compose(cov: Coverage, rgb: Rgb, background: Rgb | null): Surface {
  const box = inkBox(cov);
  const out = new Surface(box ? [box.width, box.height] : [1, 1], background ? 0 : SRCALPHA);
  if (background) out.fill(background);
  if (!box) return out;

  const c = out.channels;
  for (let y = 0; y < box.height; y++) {
    for (let x = 0; x < box.width; x++) {
      const k = cov.values[(y + box.y) * cov.width + (x + box.x)];
      if (k <= 0) continue;
      const i = (y * box.width + x) * c;
      if (background) {
        out.data[i] = Math.round(rgb[0] * k + background[0] * (1 - k));
        out.data[i + 1] = Math.round(rgb[1] * k + background[1] * (1 - k));
        out.data[i + 2] = Math.round(rgb[2] * k + background[2] * (1 - k));
      } else {
        out.data[i] = rgb[0];
        out.data[i + 1] = rgb[1];
        out.data[i + 2] = rgb[2];
        out.data[i + 3] = Math.round(k * 255);
      }
    }
  }
  return out;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export class Font {
  private readonly backend: GlyphBackend;

  /**
   * @param path - A .ttf/.otf file, or `null` for the built-in bitmap font.
   * @param size - Point size; the bitmap font scales by whole multiples of 8px.
   */
  constructor(path: string | null, size: number) {
    const px = Number.isFinite(size) && size > 0 ? size : 8;
    const outline = path === null ? null : Font.loadOutline(path, px);
    this.backend = outline ?? new BitmapBackend(Math.max(1, Math.round(px / 8)));
  }

  private static loadOutline(path: string, size: number): GlyphBackend | null {
    try {
      const bytes = readFileSync(path);
      const face = opentype.parse(bytes.buffer.slice(bytes.byteOffset, bytes.byteOffset + bytes.byteLength));
      return new OutlineBackend(face, size);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[vidsynth:font] Could not load font '${path}', using built-in font: ${message}`);
      return null;
    }
  }

  /**
   * Render one line of text. The surface is sized to the ink: RGB filled
   * with `background` when given, otherwise RGBA on transparent.
   */
  render(text: string, antialias: boolean, color: ColorLike, background?: ColorLike | null): Surface {
    const rgb = toRgb(color) ?? [255, 255, 255];
    const bg = background === undefined || background === null ? null : toRgb(background);
    return compose(this.backend.coverage(String(text), Boolean(antialias)), rgb, bg);
  }

  /**
   * `[width, height]` of the surface {@link render} would return for the
   * same `antialias` setting. Antialiased outlines can ink one more pixel.
   */
  size(text: string, antialias = true): [number, number] {
    const box = inkBox(this.backend.coverage(String(text), Boolean(antialias)));
    return box ? [box.width, box.height] : [1, 1];
  }

  getHeight(): number {
    return this.backend.lineHeight;
  }

  getLinesize(): number {
    return this.backend.lineHeight;
  }
}

/** System fonts are not looked up; every name gives the built-in font. */
export function SysFont(_name: string | null, size: number): Font {
  return new Font(null, size);
}

export function init(): void {}

export function getInit(): boolean {
  return true;
}
