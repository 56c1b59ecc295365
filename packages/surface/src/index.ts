/**
 * @vidsynth/surface: CPU pixel surfaces and the drawing API exposed to modes.
 */

export { SRCALPHA, Surface } from "./surface.js";
export { Rect, toPoint, toRect } from "./rect.js";
export type { PointLike, RectAnchor, RectLike } from "./rect.js";
export { toChannel, toRgb, toRgba } from "./color.js";
export type { ColorLike, Rgb, Rgba } from "./color.js";
export * as draw from "./draw.js";
export * as transform from "./transform.js";
export * as image from "./image.js";
export * as surfarray from "./pixel-array.js";
export type { PixelArray } from "./pixel-array.js";
export { Font, SysFont } from "./font.js";
export { DEFAULT_JPEG_QUALITY, encodeJpeg, encodeJpegDataUri } from "./encode.js";
export { gfx } from "./gfx.js";
export type { Gfx } from "./gfx.js";
