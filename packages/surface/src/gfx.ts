/**
 * The `gfx` object handed to mode scripts. Modes reach everything through
 * it: `new gfx.Surface(...)`, `gfx.draw.circle(...)`, `gfx.font.Font(...)`.
 */

import * as draw from "./draw.js";
import * as font from "./font.js";
import * as image from "./image.js";
import * as surfarray from "./pixel-array.js";
import { Rect } from "./rect.js";
import { SRCALPHA, Surface } from "./surface.js";
import * as transform from "./transform.js";

export const gfx = {
  Surface,
  Rect,
  SRCALPHA,
  draw,
  transform,
  image,
  font,
  surfarray,
  /** No-op; present so scripts written for the hardware can call it. */
  init(): void {},
  quit(): void {},
  /** Always true: the library needs no initialization. */
  getInit(): boolean {
    return true;
  },
} as const;

export type Gfx = typeof gfx;

