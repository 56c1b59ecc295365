/**
 * Shape primitives for the `gfx.draw` namespace.
 *
 * Conventions shared by every function:
 * - `width = 0` fills the shape, `width > 0` strokes it inward by that many
 *   pixels, a negative width draws nothing.
 * - Only the first three color channels are used; alpha is never composited.
 * - Malformed geometry or color is a no-op, never an error.
 * - The returned rectangle is the shape's bounds clipped to the surface.
 */

import { toRgb } from "./color.js";
import type { ColorLike, Rgb } from "./color.js";
import { fillContours } from "./raster.js";
import { Rect, toPoint, toRect } from "./rect.js";
import type { PointLike, RectLike } from "./rect.js";
import type { Surface } from "./surface.js";

function bounds(surface: Surface, x: number, y: number, w: number, h: number): Rect {
  return new Rect(x, y, w, h).clip(surface.getRect());
}

function empty(x = 0, y = 0): Rect {
  return new Rect(x, y, 0, 0);
}

/** Integer part of a size argument; non-finite values read as -1, which every primitive rejects. */
function whole(value: number): number {
  return Number.isFinite(value) ? Math.trunc(value) : -1;
}

function toPoints(points: Iterable<unknown>): [number, number][] | null {
  if (points === null || typeof points !== "object" || typeof points[Symbol.iterator] !== "function") {
    return null;
  }
  const out: [number, number][] = [];
  for (const point of points) {
    const p = toPoint(point);
    if (!p) return null;
    out.push([Math.trunc(p[0]), Math.trunc(p[1])]);
  }
  return out;
}

function boundsOf(surface: Surface, points: readonly [number, number][], pad: number): Rect {
  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;
  for (const [x, y] of points) {
    if (x < minX) minX = x;
    if (x > maxX) maxX = x;
    if (y < minY) minY = y;
    if (y > maxY) maxY = y;
  }
  return bounds(surface, minX - pad, minY - pad, maxX - minX + 2 * pad + 1, maxY - minY + 2 * pad + 1);
}

// ---------------------------------------------------------------------------
// Lines
// ---------------------------------------------------------------------------

function bresenham(surface: Surface, rgb: Rgb, x0: number, y0: number, x1: number, y1: number): void {
  const dx = Math.abs(x1 - x0);
  const dy = Math.abs(y1 - y0);
  const sx = x0 < x1 ? 1 : -1;
  const sy = y0 < y1 ? 1 : -1;
  let err = dx - dy;
  let x = x0;
  let y = y0;
  for (;;) {
    surface.plot(x, y, rgb);
    if (x === x1 && y === y1) break;
    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      x += sx;
    }
    if (e2 < dx) {
      err += dx;
      y += sy;
    }
  }
}

/**
 * Narrow the parameter interval `t` of `a0 + t * (a1 - a0)` to where the
 * coordinate stays within `[lo, hi]`. Returns false once the interval is empty.
 */
function clipAxis(a0: number, a1: number, lo: number, hi: number, t: [number, number]): boolean {
  const d = a1 - a0;
  if (d === 0) return a0 >= lo && a0 <= hi;
  let enter = (lo - a0) / d;
  let leave = (hi - a0) / d;
  if (enter > leave) [enter, leave] = [leave, enter];
  t[0] = Math.max(t[0], enter);
  t[1] = Math.min(t[1], leave);
  return t[0] <= t[1];
}

/** Bresenham over the part of the segment that can land on the surface. */
function clippedSegment(surface: Surface, rgb: Rgb, x0: number, y0: number, x1: number, y1: number): void {
  const t: [number, number] = [0, 1];
  if (!clipAxis(x0, x1, -0.5, surface.width - 0.5, t)) return;
  if (!clipAxis(y0, y1, -0.5, surface.height - 0.5, t)) return;
  if (t[0] === 0 && t[1] === 1) {
    bresenham(surface, rgb, x0, y0, x1, y1);
    return;
  }
  bresenham(
    surface,
    rgb,
    Math.round(x0 + t[0] * (x1 - x0)),
    Math.round(y0 + t[0] * (y1 - y0)),
    Math.round(x0 + t[1] * (x1 - x0)),
    Math.round(y0 + t[1] * (y1 - y0)),
  );
}

/**
 * Extra strokes sit at offsets 0, +1, -1, +2, -2, ... across the minor axis,
 * so `width` strokes cover `[-floor((width - 1) / 2), floor(width / 2)]`.
 * Only offsets whose stroke can cross the surface are visited.
 */
function thickLine(
  surface: Surface,
  rgb: Rgb,
  start: readonly [number, number],
  end: readonly [number, number],
  width: number,
): void {
  const [x0, y0] = start;
  const [x1, y1] = end;
  const xMajor = Math.abs(x1 - x0) >= Math.abs(y1 - y0);
  // Major axis first: the slice of the line whose major coordinate is on screen.
  const [ma0, ma1, mi0, mi1, majorSize, minorSize] = xMajor
    ? [x0, x1, y0, y1, surface.width, surface.height]
    : [y0, y1, x0, x1, surface.height, surface.width];
  const t: [number, number] = [0, 1];
  if (!clipAxis(ma0, ma1, -0.5, majorSize - 0.5, t)) return;
  const minorA = mi0 + t[0] * (mi1 - mi0);
  const minorB = mi0 + t[1] * (mi1 - mi0);
  const lo = Math.max(-Math.floor((width - 1) / 2), Math.ceil(-0.5 - Math.max(minorA, minorB)));
  const hi = Math.min(Math.floor(width / 2), Math.floor(minorSize - 0.5 - Math.min(minorA, minorB)));
  for (let off = lo; off <= hi; off++) {
    if (xMajor) {
      clippedSegment(surface, rgb, x0, y0 + off, x1, y1 + off);
    } else {
      clippedSegment(surface, rgb, x0 + off, y0, x1 + off, y1);
    }
  }
}

export function line(
  surface: Surface,
  color: ColorLike,
  start: PointLike,
  end: PointLike,
  width = 1,
): Rect {
  const rgb = toRgb(color);
  const a = toPoint(start);
  const b = toPoint(end);
  const w = whole(width);
  if (!rgb || !a || !b || w < 1) return empty();
  const p0: [number, number] = [Math.trunc(a[0]), Math.trunc(a[1])];
  const p1: [number, number] = [Math.trunc(b[0]), Math.trunc(b[1])];
  thickLine(surface, rgb, p0, p1, w);
  return boundsOf(surface, [p0, p1], Math.floor(w / 2));
}

/** Connected segments through `points`; closes back to the first point when `closed`. */
export function lines(
  surface: Surface,
  color: ColorLike,
  closed: boolean,
  points: Iterable<PointLike>,
  width = 1,
): Rect {
  const rgb = toRgb(color);
  const pts = toPoints(points);
  const w = whole(width);
  if (!rgb || !pts || pts.length < 2 || w < 1) return empty();
  for (let i = 0; i < pts.length - 1; i++) {
    thickLine(surface, rgb, pts[i], pts[i + 1], w);
  }
  if (closed && pts.length > 2) {
    thickLine(surface, rgb, pts[pts.length - 1], pts[0], w);
  }
  return boundsOf(surface, pts, Math.floor(w / 2));
}

// ---------------------------------------------------------------------------
// Rectangles and polygons
// ---------------------------------------------------------------------------

function fillBox(surface: Surface, rgb: Rgb, x: number, y: number, w: number, h: number): void {
  const last = Math.min(y + h, surface.height);
  for (let row = Math.max(y, 0); row < last; row++) {
    surface.span(x, x + w - 1, row, rgb);
  }
}

export function rect(surface: Surface, color: ColorLike, area: RectLike, width = 0): Rect {
  const rgb = toRgb(color);
  const r = toRect(area);
  const w = whole(width);
  if (!rgb || !r || w < 0 || r.width <= 0 || r.height <= 0) return empty(r?.x, r?.y);

  if (w === 0 || w * 2 >= Math.min(r.width, r.height)) {
    fillBox(surface, rgb, r.x, r.y, r.width, r.height);
  } else {
    fillBox(surface, rgb, r.x, r.y, r.width, w);
    fillBox(surface, rgb, r.x, r.bottom - w, r.width, w);
    fillBox(surface, rgb, r.x, r.y + w, w, r.height - 2 * w);
    fillBox(surface, rgb, r.right - w, r.y + w, w, r.height - 2 * w);
  }
  return bounds(surface, r.x, r.y, r.width, r.height);
}

export function polygon(
  surface: Surface,
  color: ColorLike,
  points: Iterable<PointLike>,
  width = 0,
): Rect {
  const rgb = toRgb(color);
  const pts = toPoints(points);
  const w = whole(width);
  if (!rgb || !pts || pts.length < 3 || w < 0) return empty();

  if (w === 0) {
    fillContours(surface, rgb, [pts.flat()], "evenodd");
    // The edges themselves are part of a filled polygon.
    lines(surface, rgb, true, pts, 1);
  } else {
    lines(surface, rgb, true, pts, w);
  }
  return boundsOf(surface, pts, w > 1 ? Math.floor(w / 2) : 0);
}

// ---------------------------------------------------------------------------
// Circles, ellipses, arcs
// ---------------------------------------------------------------------------

export function circle(
  surface: Surface,
  color: ColorLike,
  center: PointLike,
  radius: number,
  width = 0,
): Rect {
  const rgb = toRgb(color);
  const c = toPoint(center);
  const r = whole(radius);
  const w = whole(width);
  if (!rgb || !c || r < 1 || w < 0) return empty();
  const cx = Math.trunc(c[0]);
  const cy = Math.trunc(c[1]);
  const inner = w === 0 || w >= r ? -1 : r - w;

  const firstRow = Math.max(-r, -cy);
  const lastRow = Math.min(r, surface.height - 1 - cy);
  for (let dy = firstRow; dy <= lastRow; dy++) {
    const half = Math.floor(Math.sqrt(r * r - dy * dy));
    if (inner < 0 || Math.abs(dy) > inner) {
      surface.span(cx - half, cx + half, cy + dy, rgb);
      continue;
    }
    const innerHalf = Math.floor(Math.sqrt(inner * inner - dy * dy));
    surface.span(cx - half, cx - innerHalf - 1, cy + dy, rgb);
    surface.span(cx + innerHalf + 1, cx + half, cy + dy, rgb);
  }
  return bounds(surface, cx - r, cy - r, 2 * r + 1, 2 * r + 1);
}

/** Pixel columns whose centres fall within `[center - half, center + half]`. */
function centredRun(center: number, half: number): [number, number] {
  return [Math.ceil(center - half - 0.5), Math.floor(center + half - 0.5)];
}

export function ellipse(surface: Surface, color: ColorLike, area: RectLike, width = 0): Rect {
  const rgb = toRgb(color);
  const r = toRect(area);
  const w = whole(width);
  if (!rgb || !r || w < 0 || r.width <= 0 || r.height <= 0) return empty(r?.x, r?.y);

  const a = r.width / 2;
  const b = r.height / 2;
  const cx = r.x + a;
  const cy = r.y + b;
  const ai = a - w;
  const bi = b - w;
  const hollow = w > 0 && ai > 0 && bi > 0;

  const lastRow = Math.min(r.bottom, surface.height);
  for (let py = Math.max(r.y, 0); py < lastRow; py++) {
    const yc = py + 0.5 - cy;
    const t = 1 - (yc / b) ** 2;
    if (t < 0) continue;
    const [left, right] = centredRun(cx, a * Math.sqrt(t));
    const ti = hollow ? 1 - (yc / bi) ** 2 : -1;
    if (ti <= 0) {
      surface.span(left, right, py, rgb);
      continue;
    }
    const [innerLeft, innerRight] = centredRun(cx, ai * Math.sqrt(ti));
    surface.span(left, innerLeft - 1, py, rgb);
    surface.span(innerRight + 1, right, py, rgb);
  }
  return bounds(surface, r.x, r.y, r.width, r.height);
}

const DEGREES_PER_RADIAN = 180 / Math.PI;

function normalizeDegrees(deg: number): number {
  return ((deg % 360) + 360) % 360;
}

/**
 * Elliptical arc inscribed in `area`, from `startAngle` to `stopAngle`
 * (radians, counterclockwise, 0 pointing right). Only the stroke is drawn.
 */
export function arc(
  surface: Surface,
  color: ColorLike,
  area: RectLike,
  startAngle: number,
  stopAngle: number,
  width = 1,
): Rect {
  const rgb = toRgb(color);
  const r = toRect(area);
  const w = whole(width);
  if (!rgb || !r || w < 1 || r.width <= 0 || r.height <= 0) return empty(r?.x, r?.y);
  if (!Number.isFinite(startAngle) || !Number.isFinite(stopAngle)) return empty(r.x, r.y);

  const startDeg = startAngle * DEGREES_PER_RADIAN;
  let stopDeg = stopAngle * DEGREES_PER_RADIAN;
  if (stopDeg < startDeg) {
    stopDeg += 360 * Math.ceil((startDeg - stopDeg) / 360);
  }
  const sweep = stopDeg - startDeg;
  const from = normalizeDegrees(startDeg);

  const a = r.width / 2;
  const b = r.height / 2;
  const cx = r.x + a;
  const cy = r.y + b;
  const ai = a - w;
  const bi = b - w;

  const clip = bounds(surface, r.x, r.y, r.width, r.height);
  for (let py = clip.top; py < clip.bottom; py++) {
    const dy = py + 0.5 - cy;
    for (let px = clip.left; px < clip.right; px++) {
      const dx = px + 0.5 - cx;
      if ((dx / a) ** 2 + (dy / b) ** 2 > 1) continue;
      if (ai > 0 && bi > 0 && (dx / ai) ** 2 + (dy / bi) ** 2 < 1) continue;
      if (sweep < 360) {
        // Screen y grows downward; flip it so angles run counterclockwise.
        const angle = normalizeDegrees(Math.atan2(-dy, dx) * DEGREES_PER_RADIAN);
        if (normalizeDegrees(angle - from) > sweep) continue;
      }
      surface.plot(px, py, rgb);
    }
  }
  return clip;
}
