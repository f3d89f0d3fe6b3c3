import { readFileSync, writeFileSync } from 'node:fs';
import { fail, ok } from './errors';
import type { Result } from './errors';
import { rgb888, toRgb888 } from './canvas';
import type { Canvas } from './canvas';

// ============================================================================
// Container constants
// ============================================================================

const MAGIC = 0x4d42; // "BM"
const FILE_HEADER_SIZE = 14;
const DIB_HEADER_SIZE = 40;
const MASK_SIZE = 12;

const COMPRESSION_RGB = 0;
const COMPRESSION_BITFIELDS = 3;

const MASK_RED = 0xf800;
const MASK_GREEN = 0x07e0;
const MASK_BLUE = 0x001f;

/** Largest pixel count the codec accepts */
export const MAX_BITMAP_PIXELS = 1 << 24;

// ============================================================================
// Pixel formats
// ============================================================================

export type PixelFormat = 'rgb565' | 'rgb888' | 'rgba8888';

/**
 * How one pixel format is stored. All accessors convert from and to RGB565,
 * the working format of every canvas.
 */
export interface PixelLayout {
  format: PixelFormat;
  bitsPerPixel: 16 | 24 | 32;
  compression: number;
  payloadOffset: number;
  read(bytes: Uint8Array, offset: number): number;
  write(bytes: Uint8Array, offset: number, color: number): void;
}

export const PIXEL_LAYOUTS: Readonly<Record<PixelFormat, PixelLayout>> = {
  rgb565: {
    format: 'rgb565',
    bitsPerPixel: 16,
    compression: COMPRESSION_BITFIELDS,
    payloadOffset: FILE_HEADER_SIZE + DIB_HEADER_SIZE + MASK_SIZE,
    read: (bytes, offset) => bytes[offset] | (bytes[offset + 1] << 8),
    write: (bytes, offset, color) => {
      bytes[offset] = color & 0xff;
      bytes[offset + 1] = (color >> 8) & 0xff;
    },
  },
  // Stored blue first
  rgb888: {
    format: 'rgb888',
    bitsPerPixel: 24,
    compression: COMPRESSION_RGB,
    payloadOffset: FILE_HEADER_SIZE + DIB_HEADER_SIZE,
    read: (bytes, offset) => rgb888(bytes[offset + 2], bytes[offset + 1], bytes[offset]),
    write: (bytes, offset, color) => {
      const [r, g, b] = toRgb888(color);
      bytes[offset] = b;
      bytes[offset + 1] = g;
      bytes[offset + 2] = r;
    },
  },
  // Little-endian 0xAARRGGBB words
  rgba8888: {
    format: 'rgba8888',
    bitsPerPixel: 32,
    compression: COMPRESSION_RGB,
    payloadOffset: FILE_HEADER_SIZE + DIB_HEADER_SIZE,
    read: (bytes, offset) => rgb888(bytes[offset + 2], bytes[offset + 1], bytes[offset]),
    write: (bytes, offset, color) => {
      const [r, g, b] = toRgb888(color);
      bytes[offset] = b;
      bytes[offset + 1] = g;
      bytes[offset + 2] = r;
      bytes[offset + 3] = 0xff;
    },
  },
};

/** Bytes per scanline, padded to a multiple of four */
export function strideOf(width: number, bitsPerPixel: number): number {
  return ((width * bitsPerPixel + 31) & ~31) >> 3;
}

// ============================================================================
// Bitmap
// ============================================================================

/** Decoded bitmap with its scanlines stored top-down */
export interface Bitmap {
  format: PixelFormat;
  width: number;
  height: number;
  stride: number;
  pixels: Uint8Array;
}

function validSize(width: number, height: number): boolean {
  return (
    Number.isInteger(width) &&
    Number.isInteger(height) &&
    width >= 1 &&
    height >= 1 &&
    width * height <= MAX_BITMAP_PIXELS
  );
}

export function createBitmap(width: number, height: number, format: PixelFormat): Result<Bitmap> {
  if (!validSize(width, height)) return fail('outOfRange', 'bitmap');
  const stride = strideOf(width, PIXEL_LAYOUTS[format].bitsPerPixel);
  return ok({ format, width, height, stride, pixels: new Uint8Array(stride * height) });
}

function formatOf(bitCount: number, compression: number, payloadOffset: number): PixelFormat | null {
  for (const layout of Object.values(PIXEL_LAYOUTS)) {
    if (
      layout.bitsPerPixel === bitCount &&
      layout.compression === compression &&
      layout.payloadOffset === payloadOffset
    ) {
      return layout.format;
    }
  }
  return null;
}

export function decodeBitmap(bytes: Uint8Array): Result<Bitmap> {
  if (bytes.length < FILE_HEADER_SIZE) return fail('ioFailure', 'bitmap');
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  const magic = view.getUint16(0, true);
  const fileSize = view.getUint32(2, true);
  const reserved = view.getUint32(6, true);
  const payloadOffset = view.getUint32(10, true);
  const dibAndMaskSize = payloadOffset - FILE_HEADER_SIZE;
  if (
    magic !== MAGIC ||
    reserved !== 0 ||
    fileSize === 0 ||
    (payloadOffset !== PIXEL_LAYOUTS.rgb888.payloadOffset &&
      payloadOffset !== PIXEL_LAYOUTS.rgb565.payloadOffset)
  ) {
    return fail('malformedContainer', 'bitmap');
  }
  if (bytes.length < payloadOffset) return fail('ioFailure', 'bitmap');

  const dibSize = view.getUint32(14, true);
  const width = view.getInt32(18, true);
  const rawHeight = view.getInt32(22, true);
  const planes = view.getUint16(26, true);
  const bitCount = view.getUint16(28, true);
  const compression = view.getUint32(30, true);
  const height = Math.abs(rawHeight);
  if (
    (dibSize + MASK_SIZE !== dibAndMaskSize && dibSize !== dibAndMaskSize) ||
    planes !== 1 ||
    width <= 0 ||
    rawHeight === 0 ||
    width * height > MAX_BITMAP_PIXELS
  ) {
    return fail('malformedContainer', 'bitmap');
  }

  const format = formatOf(bitCount, compression, payloadOffset);
  if (!format) return fail('malformedContainer', 'bitmap');
  if (format === 'rgb565') {
    if (dibSize + MASK_SIZE !== dibAndMaskSize) return fail('malformedContainer', 'bitmap');
    const maskOffset = FILE_HEADER_SIZE + dibSize;
    if (
      view.getUint32(maskOffset, true) !== MASK_RED ||
      view.getUint32(maskOffset + 4, true) !== MASK_GREEN ||
      view.getUint32(maskOffset + 8, true) !== MASK_BLUE
    ) {
      return fail('malformedContainer', 'bitmap');
    }
  }

  const stride = strideOf(width, bitCount);
  const payloadSize = stride * height;
  if (bytes.length < payloadOffset + payloadSize) return fail('ioFailure', 'bitmap');

  const pixels = new Uint8Array(payloadSize);
  const payload = bytes.subarray(payloadOffset, payloadOffset + payloadSize);
  if (rawHeight > 0) {
    // Bottom-up rows
    for (let y = 0; y < height; y++) {
      const from = (height - 1 - y) * stride;
      pixels.set(payload.subarray(from, from + stride), y * stride);
    }
  } else {
    pixels.set(payload);
  }

  return ok({ format, width, height, stride, pixels });
}

/** Serialise as a top-down file */
export function encodeBitmap(bitmap: Bitmap): Result<Uint8Array> {
  const layout = PIXEL_LAYOUTS[bitmap.format];
  const { width, height, stride } = bitmap;
  if (
    !validSize(width, height) ||
    stride !== strideOf(width, layout.bitsPerPixel) ||
    bitmap.pixels.length !== stride * height
  ) {
    return fail('malformedContainer', 'bitmap');
  }

  const payloadSize = stride * height;
  const fileSize = layout.payloadOffset + payloadSize;
  const bytes = new Uint8Array(fileSize);
  const view = new DataView(bytes.buffer);

  view.setUint16(0, MAGIC, true);
  view.setUint32(2, fileSize, true);
  view.setUint32(6, 0, true);
  view.setUint32(10, layout.payloadOffset, true);

  view.setUint32(14, DIB_HEADER_SIZE, true);
  view.setInt32(18, width, true);
  view.setInt32(22, -height, true);
  view.setUint16(26, 1, true);
  view.setUint16(28, layout.bitsPerPixel, true);
  view.setUint32(30, layout.compression, true);
  view.setUint32(34, payloadSize, true);
  // resolution and palette fields stay zero

  if (bitmap.format === 'rgb565') {
    const maskOffset = FILE_HEADER_SIZE + DIB_HEADER_SIZE;
    view.setUint32(maskOffset, MASK_RED, true);
    view.setUint32(maskOffset + 4, MASK_GREEN, true);
    view.setUint32(maskOffset + 8, MASK_BLUE, true);
  }

  bytes.set(bitmap.pixels, layout.payloadOffset);
  return ok(bytes);
}

// ============================================================================
// Files
// ============================================================================

export function readBitmapFile(path: string): Result<Bitmap> {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    console.warn(`[Bitmap] Failed to read ${path}:`, err);
    return fail('ioFailure', 'bitmap');
  }
  return decodeBitmap(bytes);
}

export function writeBitmapFile(path: string, bitmap: Bitmap): Result<void> {
  const encoded = encodeBitmap(bitmap);
  if (!encoded.ok) return encoded;
  try {
    writeFileSync(path, encoded.value);
  } catch (err) {
    console.warn(`[Bitmap] Failed to write ${path}:`, err);
    return fail('ioFailure', 'bitmap');
  }
  return ok(undefined);
}

// ============================================================================
// Canvas exchange
// ============================================================================

/** Crop a rectangle of the bitmap into a new RGB565 canvas */
export function editBitmap(
  bitmap: Bitmap,
  x: number,
  y: number,
  width: number,
  height: number
): Result<Canvas> {
  if (width < 1 || height < 1 || x < 0 || y < 0 || x + width > bitmap.width || y + height > bitmap.height) {
    return fail('outOfRange', 'bitmap');
  }

  const layout = PIXEL_LAYOUTS[bitmap.format];
  const bytesPerPixel = layout.bitsPerPixel >> 3;
  const data = new Uint16Array(width * height);
  for (let row = 0; row < height; row++) {
    const rowStart = (row + y) * bitmap.stride;
    for (let col = 0; col < width; col++) {
      data[row * width + col] = layout.read(bitmap.pixels, rowStart + (col + x) * bytesPerPixel);
    }
  }
  return ok({ data, width, height });
}

/** Write a whole canvas into the bitmap with its origin at (x, y) */
export function mergeIntoBitmap(canvas: Canvas, x: number, y: number, bitmap: Bitmap): Result<Bitmap> {
  if (x < 0 || y < 0 || canvas.width + x > bitmap.width || canvas.height + y > bitmap.height) {
    return fail('outOfRange', 'bitmap');
  }

  const layout = PIXEL_LAYOUTS[bitmap.format];
  const bytesPerPixel = layout.bitsPerPixel >> 3;
  for (let row = 0; row < canvas.height; row++) {
    const rowStart = (row + y) * bitmap.stride;
    for (let col = 0; col < canvas.width; col++) {
      layout.write(bitmap.pixels, rowStart + (col + x) * bytesPerPixel, canvas.data[row * canvas.width + col]);
    }
  }
  return ok(bitmap);
}

/** Bitmap holding exactly the canvas pixels */
export function bitmapFromCanvas(canvas: Canvas, format: PixelFormat = 'rgb565'): Result<Bitmap> {
  const created = createBitmap(canvas.width, canvas.height, format);
  if (!created.ok) return created;
  return mergeIntoBitmap(canvas, 0, 0, created.value);
}
