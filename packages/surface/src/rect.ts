/**
 * Integer rectangles with the anchor vocabulary modes use to position
 * surfaces relative to each other.
 */

/** An `[x, y]` pair, or any array-like whose first two entries are numbers. */
export type PointLike = ArrayLike<number>;

/** Anchors accepted by {@link Rect.anchor} and `Surface.getRect`. */
export interface RectAnchor {
  readonly center?: PointLike;
  readonly topleft?: PointLike;
  readonly topright?: PointLike;
  readonly bottomleft?: PointLike;
  readonly bottomright?: PointLike;
  readonly centerx?: number;
  readonly centery?: number;
  readonly x?: number;
  readonly y?: number;
}

/** Anything {@link toRect} can turn into a rectangle. */
export type RectLike =
  | Rect
  | ArrayLike<number>
  | readonly [PointLike, PointLike]
  | { readonly x: number; readonly y: number; readonly width: number; readonly height: number };

export class Rect {
  x: number;
  y: number;
  width: number;
  height: number;

  constructor(x: number, y: number, width: number, height: number) {
    this.x = Math.trunc(x);
    this.y = Math.trunc(y);
    this.width = Math.trunc(width);
    this.height = Math.trunc(height);
  }

  get left(): number {
    return this.x;
  }

  get top(): number {
    return this.y;
  }

  get right(): number {
    return this.x + this.width;
  }

  get bottom(): number {
    return this.y + this.height;
  }

  get centerx(): number {
    return this.x + Math.trunc(this.width / 2);
  }

  get centery(): number {
    return this.y + Math.trunc(this.height / 2);
  }

  get center(): [number, number] {
    return [this.centerx, this.centery];
  }

  get topleft(): [number, number] {
    return [this.x, this.y];
  }

  get topright(): [number, number] {
    return [this.right, this.y];
  }

  get bottomleft(): [number, number] {
    return [this.x, this.bottom];
  }

  get bottomright(): [number, number] {
    return [this.right, this.bottom];
  }

  get size(): [number, number] {
    return [this.width, this.height];
  }

  /**
   * Reposition in place so the given anchor lands on the given coordinate.
   * Anchors apply in declaration order; later ones win on the same axis.
   */
  anchor(anchor: RectAnchor): this {
    if (anchor.x !== undefined) this.x = Math.trunc(anchor.x);
    if (anchor.y !== undefined) this.y = Math.trunc(anchor.y);
    if (anchor.topleft) {
      this.x = Math.trunc(anchor.topleft[0]);
      this.y = Math.trunc(anchor.topleft[1]);
    }
    if (anchor.topright) {
      this.x = Math.trunc(anchor.topright[0]) - this.width;
      this.y = Math.trunc(anchor.topright[1]);
    }
    if (anchor.bottomleft) {
      this.x = Math.trunc(anchor.bottomleft[0]);
      this.y = Math.trunc(anchor.bottomleft[1]) - this.height;
    }
    if (anchor.bottomright) {
      this.x = Math.trunc(anchor.bottomright[0]) - this.width;
      this.y = Math.trunc(anchor.bottomright[1]) - this.height;
    }
    if (anchor.center) {
      this.x = Math.trunc(anchor.center[0]) - Math.trunc(this.width / 2);
      this.y = Math.trunc(anchor.center[1]) - Math.trunc(this.height / 2);
    }
    if (anchor.centerx !== undefined) {
      this.x = Math.trunc(anchor.centerx) - Math.trunc(this.width / 2);
    }
    if (anchor.centery !== undefined) {
      this.y = Math.trunc(anchor.centery) - Math.trunc(this.height / 2);
    }
    return this;
  }

  /** A copy shifted by the given offset. */
  move(dx: number, dy: number): Rect {
    return new Rect(this.x + dx, this.y + dy, this.width, this.height);
  }

  /** A copy grown by `dx`/`dy` in total, keeping the same centre. */
  inflate(dx: number, dy: number): Rect {
    const ix = Math.trunc(dx);
    const iy = Math.trunc(dy);
    return new Rect(
      this.x - Math.trunc(ix / 2),
      this.y - Math.trunc(iy / 2),
      this.width + ix,
      this.height + iy,
    );
  }

  /** Intersection with another rectangle; zero-sized at this rect's origin when disjoint. */
  clip(other: Rect): Rect {
    const left = Math.max(this.left, other.left);
    const top = Math.max(this.top, other.top);
    const right = Math.min(this.right, other.right);
    const bottom = Math.min(this.bottom, other.bottom);
    if (right <= left || bottom <= top) {
      return new Rect(this.x, this.y, 0, 0);
    }
    return new Rect(left, top, right - left, bottom - top);
  }

  collidepoint(x: number, y: number): boolean {
    return x >= this.left && x < this.right && y >= this.top && y < this.bottom;
  }

  copy(): Rect {
    return new Rect(this.x, this.y, this.width, this.height);
  }

  toString(): string {
    return `<rect(${this.x}, ${this.y}, ${this.width}, ${this.height})>`;
  }
}

function isArrayLike(value: unknown): value is ArrayLike<unknown> {
  return (
    value !== null &&
    typeof value === "object" &&
    "length" in value &&
    typeof value.length === "number"
  );
}

function isPair(value: unknown): value is PointLike {
  return isArrayLike(value) && value.length >= 2;
}

/**
 * Read a point. Returns `null` unless the value has two finite coordinates.
 */
export function toPoint(value: unknown): [number, number] | null {
  if (!isPair(value)) return null;
  const x = Number(value[0]);
  const y = Number(value[1]);
  if (!Number.isFinite(x) || !Number.isFinite(y)) return null;
  return [x, y];
}

/**
 * Read a rectangle from any of the shapes modes pass.
 * Returns `null` for malformed input rather than throwing.
 */
export function toRect(value: unknown): Rect | null {
  if (value instanceof Rect) return value;
  if (isArrayLike(value)) {
    if (value.length >= 4) {
      const [x, y, w, h] = [value[0], value[1], value[2], value[3]].map(Number);
      if (![x, y, w, h].every(Number.isFinite)) return null;
      return new Rect(x, y, w, h);
    }
    if (value.length === 2) {
      const origin = toPoint(value[0]);
      const size = toPoint(value[1]);
      if (!origin || !size) return null;
      return new Rect(origin[0], origin[1], size[0], size[1]);
    }
    return null;
  }
  if (value !== null && typeof value === "object") {
    if ("x" in value && "y" in value && "width" in value && "height" in value) {
      const [x, y, w, h] = [value.x, value.y, value.width, value.height].map(Number);
      if (![x, y, w, h].every(Number.isFinite)) return null;
      return new Rect(x, y, w, h);
    }
  }
  return null;
}
