/**
 * Scanline rasterization shared by polygon drawing and outline fonts.
 *
 * Coverage is decided at pixel centres: pixel (px, py) is inside when the
 * point (px + 0.5, py + 0.5) is inside the path under the chosen fill rule.
 */

import type { Rgb } from "./color.js";
import type { Surface } from "./surface.js";

/** A closed contour as a flat `[x0, y0, x1, y1, ...]` list. */
export type Contour = readonly number[];

export type FillRule = "evenodd" | "nonzero";

interface Crossing {
  readonly x: number;
  readonly dir: 1 | -1;
}

/** Vertical extent of a set of contours, or null when there are no points. */
function verticalBounds(contours: readonly Contour[]): [number, number] | null {
  let minY = Infinity;
  let maxY = -Infinity;
  for (const contour of contours) {
    for (let i = 1; i < contour.length; i += 2) {
      const y = contour[i];
      if (y < minY) minY = y;
      if (y > maxY) maxY = y;
    }
  }
  return minY <= maxY ? [minY, maxY] : null;
}

function crossingsAt(contours: readonly Contour[], sy: number): Crossing[] {
  const crossings: Crossing[] = [];
  for (const contour of contours) {
    const n = contour.length / 2;
    if (n < 2) continue;
    for (let i = 0; i < n; i++) {
      const j = (i + 1) % n;
      const x0 = contour[i * 2];
      const y0 = contour[i * 2 + 1];
      const x1 = contour[j * 2];
      const y1 = contour[j * 2 + 1];
      if (y0 === y1) continue;
      // Half-open on the upper end so shared vertices count once.
      if ((y0 <= sy && sy < y1) || (y1 <= sy && sy < y0)) {
        const x = x0 + ((sy - y0) * (x1 - x0)) / (y1 - y0);
        crossings.push({ x, dir: y1 > y0 ? 1 : -1 });
      }
    }
  }
  crossings.sort((a, b) => a.x - b.x);
  return crossings;
}

/**
 * Fill one or more closed contours with an opaque color.
 * Rows outside the surface are skipped; spans are clipped by the surface.
 */
export function fillContours(
  surface: Surface,
  rgb: Rgb,
  contours: readonly Contour[],
  rule: FillRule,
): void {
  const bounds = verticalBounds(contours);
  if (!bounds) return;
  const firstRow = Math.max(0, Math.floor(bounds[0]));
  const lastRow = Math.min(surface.height - 1, Math.ceil(bounds[1]));

  for (let py = firstRow; py <= lastRow; py++) {
    const crossings = crossingsAt(contours, py + 0.5);
    let winding = 0;
    for (let i = 0; i < crossings.length - 1; i++) {
      const current = crossings[i];
      const next = crossings[i + 1];
      winding = rule === "nonzero" ? winding + current.dir : winding ^ 1;
      if (winding === 0) continue;
      const start = Math.ceil(current.x - 0.5);
      const end = Math.ceil(next.x - 0.5) - 1;
      if (end >= start) surface.span(start, end, py, rgb);
    }
  }
}
