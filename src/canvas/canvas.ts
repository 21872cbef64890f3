import { fail, executionError, semanticError } from "../errors/diagnostic.js";
import { WHITE, type Color } from "./colors.js";

export interface Point {
  x: number;
  y: number;
}

export const MIN_CANVAS_SIZE = 16;
export const MAX_CANVAS_SIZE = 1024;
export const DEFAULT_CANVAS_SIZE = 200;

export type CanvasListener = (canvas: Canvas) => void;

/**
 * The drawing surface the interpreter borrows for one run. Positions handed
 * to the drawing methods may stray off the grid; those pixels are skipped.
 */
export interface RasterTarget {
  readonly size: number;
  drawLine(from: Point, to: Point, width: number, color: Color): void;
  drawCircle(center: Point, radius: number, width: number, color: Color): void;
  drawRectangleBorder(center: Point, width: number, height: number, strokeWidth: number, color: Color): void;
  floodFill(start: Point, color: Color): void;
  isInBounds(x: number, y: number): boolean;
  colorAt(x: number, y: number): Color;
  countColorInBox(color: Color, corner1: Point, corner2: Point): number;
}

export function validateCanvasSize(size: number): void {
  if (!Number.isInteger(size) || size < MIN_CANVAS_SIZE || size > MAX_CANVAS_SIZE) {
    fail(semanticError(`Canvas size must be an integer between ${MIN_CANVAS_SIZE} and ${MAX_CANVAS_SIZE}, got ${size}`));
  }
}

export class Canvas implements RasterTarget {
  private side: number;
  private buffer: Uint32Array;
  private listeners = new Set<CanvasListener>();

  constructor(size: number = DEFAULT_CANVAS_SIZE) {
    validateCanvasSize(size);
    this.side = size;
    this.buffer = new Uint32Array(size * size).fill(WHITE);
  }

  get size(): number {
    return this.side;
  }

  /** Row-major copy of the pixel buffer. */
  pixels(): Uint32Array {
    return this.buffer.slice();
  }

  onChange(listener: CanvasListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Replaces the grid with a blank one of the new size. */
  resize(newSize: number): void {
    validateCanvasSize(newSize);
    this.side = newSize;
    this.buffer = new Uint32Array(newSize * newSize).fill(WHITE);
    this.changed();
  }

  clear(): void {
    this.buffer.fill(WHITE);
    this.changed();
  }

  isInBounds(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.side && y < this.side;
  }

  colorAt(x: number, y: number): Color {
    if (!this.isInBounds(x, y)) {
      fail(executionError(`Position (${x}, ${y}) is outside the ${this.side}x${this.side} canvas`));
    }
    return this.buffer[y * this.side + x];
  }

  countColorInBox(color: Color, corner1: Point, corner2: Point): number {
    const minX = Math.max(0, Math.min(corner1.x, corner2.x));
    const maxX = Math.min(this.side - 1, Math.max(corner1.x, corner2.x));
    const minY = Math.max(0, Math.min(corner1.y, corner2.y));
    const maxY = Math.min(this.side - 1, Math.max(corner1.y, corner2.y));

    let count = 0;
    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        if (this.buffer[y * this.side + x] === color) count++;
      }
    }
    return count;
  }

  // ============================================================
  // Drawing
  // ============================================================

  /** Bresenham line, stamping a brush disk at every step. */
  drawLine(from: Point, to: Point, width: number, color: Color): void {
    const radius = Math.floor(width / 2);
    const dx = Math.abs(to.x - from.x);
    const dy = Math.abs(to.y - from.y);
    const sx = from.x < to.x ? 1 : -1;
    const sy = from.y < to.y ? 1 : -1;
    let err = dx - dy;
    let x = from.x;
    let y = from.y;

    while (true) {
      this.stamp(x, y, radius, color);
      if (x === to.x && y === to.y) break;

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
    this.changed();
  }

  /** Midpoint circle outline with 8-way symmetry. */
  drawCircle(center: Point, radius: number, width: number, color: Color): void {
    const brush = Math.floor(width / 2);
    const [nearest, farthest] = this.distanceRange(center);
    // the outline strays at most one pixel from the true radius
    if (radius - brush - 1 > farthest || radius + brush + 1 < nearest) {
      this.changed();
      return;
    }
    // the first stamp, at distance `radius` from the center, already covers every pixel
    if (radius >= 0 && brush >= radius + farthest) {
      this.fillBox(0, this.side - 1, 0, this.side - 1, color);
      this.changed();
      return;
    }

    // past this offset every symmetric point is too far along one axis to reach the grid
    const last = this.side - 1;
    const reach = Math.max(center.x, last - center.x, center.y, last - center.y) + brush;
    let x = radius;
    let y = 0;
    let decision = 1 - radius;

    while (x >= y && y <= reach) {
      this.stamp(center.x + x, center.y + y, brush, color);
      this.stamp(center.x - x, center.y + y, brush, color);
      this.stamp(center.x + x, center.y - y, brush, color);
      this.stamp(center.x - x, center.y - y, brush, color);
      this.stamp(center.x + y, center.y + x, brush, color);
      this.stamp(center.x - y, center.y + x, brush, color);
      this.stamp(center.x + y, center.y - x, brush, color);
      this.stamp(center.x - y, center.y - x, brush, color);

      y++;
      if (decision <= 0) {
        decision += 2 * y + 1;
      } else {
        x--;
        decision += 2 * (y - x) + 1;
      }
    }
    this.changed();
  }

  /**
   * Unfilled border: horizontal strokes span the nominal width and grow
   * outward (up for the top edge, down for the bottom), vertical strokes
   * likewise grow left and right. Each stroke is clipped to the grid first.
   */
  drawRectangleBorder(center: Point, width: number, height: number, strokeWidth: number, color: Color): void {
    const halfWidth = Math.trunc(width / 2);
    const halfHeight = Math.trunc(height / 2);
    const left = center.x - halfWidth;
    const right = center.x + halfWidth;
    const top = center.y - halfHeight;
    const bottom = center.y + halfHeight;
    const reach = strokeWidth - 1;

    this.fillBox(left, right, top - reach, top, color);
    this.fillBox(left, right, bottom, bottom + reach, color);
    this.fillBox(left - reach, left, top, bottom, color);
    this.fillBox(right, right + reach, top, bottom, color);
    this.changed();
  }

  /** Breadth-first, 4-connected; a pixel is recoloured as soon as it is queued. */
  floodFill(start: Point, color: Color): void {
    if (!this.isInBounds(start.x, start.y)) return;
    const target = this.buffer[start.y * this.side + start.x];
    if (target === color) return;

    const side = this.side;
    const queue: number[] = [start.y * side + start.x];
    this.buffer[queue[0]] = color;

    for (let head = 0; head < queue.length; head++) {
      const index = queue[head];
      const x = index % side;
      const y = (index - x) / side;

      if (x + 1 < side) this.visit(index + 1, target, color, queue);
      if (x > 0) this.visit(index - 1, target, color, queue);
      if (y + 1 < side) this.visit(index + side, target, color, queue);
      if (y > 0) this.visit(index - side, target, color, queue);
    }
    this.changed();
  }

  // ============================================================
  // Helpers
  // ============================================================

  private visit(index: number, target: Color, color: Color, queue: number[]): void {
    if (this.buffer[index] !== target) return;
    this.buffer[index] = color;
    queue.push(index);
  }

  /** Filled disk of the given radius, painted one clipped row at a time. */
  private stamp(cx: number, cy: number, radius: number, color: Color): void {
    const r2 = radius * radius;
    const minY = Math.max(cy - radius, 0);
    const maxY = Math.min(cy + radius, this.side - 1);
    for (let y = minY; y <= maxY; y++) {
      const dy = y - cy;
      let span = Math.floor(Math.sqrt(r2 - dy * dy));
      // sqrt may round up to the next integer for large radii
      while (span * span + dy * dy > r2) span--;
      this.fillBox(cx - span, cx + span, y, y, color);
    }
  }

  /** Paints the inclusive box, skipping whatever lies off the grid. */
  private fillBox(x0: number, x1: number, y0: number, y1: number, color: Color): void {
    const minX = Math.max(x0, 0);
    const maxX = Math.min(x1, this.side - 1);
    const minY = Math.max(y0, 0);
    const maxY = Math.min(y1, this.side - 1);
    for (let y = minY; y <= maxY; y++) {
      for (let x = minX; x <= maxX; x++) {
        this.buffer[y * this.side + x] = color;
      }
    }
  }

  /** Distances from `point` to the closest and farthest pixel of the grid. */
  private distanceRange(point: Point): [number, number] {
    const last = this.side - 1;
    const gapX = Math.max(0, -point.x, point.x - last);
    const gapY = Math.max(0, -point.y, point.y - last);
    const spanX = Math.max(Math.abs(point.x), Math.abs(point.x - last));
    const spanY = Math.max(Math.abs(point.y), Math.abs(point.y - last));
    return [Math.hypot(gapX, gapY), Math.hypot(spanX, spanY)];
  }

  private changed(): void {
    for (const listener of this.listeners) listener(this);
  }
}
