import { fail, ok } from './errors';
import type { Result } from './errors';

// ============================================================================
// RGB565 pixel canvas
// ============================================================================

/** Row-major grid of 16-bit 5-6-5 RGB pixels */
export interface Canvas {
  data: Uint16Array;
  width: number;
  height: number;
}

/** Largest side length a canvas may have */
export const MAX_CANVAS_SIDE = 0xffff;

/** Pack already reduced 5-6-5 channel values */
export function rgb565(r: number, g: number, b: number): number {
  return ((r & 0x1f) << 11) | ((g & 0x3f) << 5) | (b & 0x1f);
}

/** Pack 8-bit channels, dropping the low bits */
export function rgb888(r: number, g: number, b: number): number {
  return ((r & 0xf8) << 8) | ((g & 0xfc) << 3) | ((b & 0xf8) >> 3);
}

/** Expand a 5-6-5 pixel back to 8-bit channels (low bits zero) */
export function toRgb888(color: number): [number, number, number] {
  return [(color >> 8) & 0xf8, (color >> 3) & 0xfc, (color << 3) & 0xf8];
}

function isSide(value: number): boolean {
  return Number.isInteger(value) && value >= 1 && value <= MAX_CANVAS_SIDE;
}

export function createCanvas(width: number, height: number): Result<Canvas> {
  if (!isSide(width) || !isSide(height)) return fail('outOfRange', 'canvas');
  return ok({ data: new Uint16Array(width * height), width, height });
}

/** Crop a rectangle that must lie entirely inside `source` */
export function copyCanvas(
  source: Canvas,
  x: number,
  y: number,
  width: number,
  height: number
): Result<Canvas> {
  if (
    !isSide(width) ||
    !isSide(height) ||
    x < 0 ||
    y < 0 ||
    x + width > source.width ||
    y + height > source.height
  ) {
    return fail('outOfRange', 'canvas');
  }

  const data = new Uint16Array(width * height);
  for (let row = 0; row < height; row++) {
    const start = (row + y) * source.width + x;
    data.set(source.data.subarray(start, start + width), row * width);
  }
  return ok({ data, width, height });
}

/**
 * Composite a `width`×`height` window of `source` at (sx, sy) onto `target`
 * at (tx, ty). Offsets may be negative; pixels falling outside either canvas
 * are skipped.
 */
export function mergeCanvas(
  source: Canvas,
  sx: number,
  sy: number,
  tx: number,
  ty: number,
  width: number,
  height: number,
  target: Canvas
): Result<Canvas> {
  if (width < 1 || height < 1) return fail('outOfRange', 'canvas');

  for (let y = 0; y < height; y++) {
    const srcY = y + sy;
    const dstY = y + ty;
    if (srcY < 0 || dstY < 0 || srcY >= source.height || dstY >= target.height) continue;
    for (let x = 0; x < width; x++) {
      const srcX = x + sx;
      const dstX = x + tx;
      if (srcX < 0 || dstX < 0 || srcX >= source.width || dstX >= target.width) continue;
      target.data[dstY * target.width + dstX] = source.data[srcY * source.width + srcX];
    }
  }
  return ok(target);
}

export function getPixel(canvas: Canvas, x: number, y: number): Result<number> {
  if (x < 0 || y < 0 || x >= canvas.width || y >= canvas.height) return fail('outOfRange', 'canvas');
  return ok(canvas.data[y * canvas.width + x]);
}

export function setPixel(canvas: Canvas, x: number, y: number, color: number): Result<void> {
  if (x < 0 || y < 0 || x >= canvas.width || y >= canvas.height) return fail('outOfRange', 'canvas');
  canvas.data[y * canvas.width + x] = color;
  return ok(undefined);
}
