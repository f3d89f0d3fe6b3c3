import { fail, ok } from './errors';
import type { Result } from './errors';
import { rgb888 } from './canvas';
import type { Canvas } from './canvas';

// ============================================================================
// OSD fonts
// ============================================================================

/**
 * A fixed-size OSD font recognised by sampling eight probe pixels. Each probe
 * that shows the glyph colour sets its bit in an 8-bit signature, which is then
 * looked up in the glyph table.
 */
export interface OcrFont {
  name: string;
  width: number;
  height: number;
  color: number;
  /** Probe offsets inside the glyph cell, bit 0 first */
  probes: ReadonlyArray<readonly [number, number]>;
  glyphs: ReadonlyMap<number, string>;
}

export const LARGE_FONT: OcrFont = {
  name: 'large',
  width: 18,
  height: 23,
  color: rgb888(0xff, 0xff, 0xff),
  probes: [
    [10, 1],
    [16, 1],
    [3, 4],
    [15, 4],
    [12, 7],
    [8, 11],
    [16, 14],
    [8, 18],
  ],
  glyphs: new Map([
    [0x41, '0'],
    [0x11, '1'],
    [0x8d, '2'],
    [0x35, '3'],
    [0x51, '4'],
    [0x01, '5'],
    [0x69, '6'],
    [0xbb, '7'],
    [0x7d, '8'],
    [0x25, '9'],
    [0x00, ' '],
    [0x28, 'C'],
    [0x30, 'F'],
    [0x80, '.'],
    [0x84, 'L'],
    [0x20, '-'],
    [0xcc, 'O'],
  ]),
};

export const SMALL_FONT: OcrFont = {
  name: 'small',
  width: 10,
  height: 12,
  color: rgb888(0xff, 0xff, 0xff),
  probes: [
    [3, 1],
    [5, 2],
    [1, 4],
    [6, 5],
    [4, 8],
    [7, 8],
    [5, 10],
    [7, 10],
  ],
  glyphs: new Map([
    [0x25, '0'],
    [0x52, '1'],
    [0xd0, '2'],
    [0x89, '3'],
    [0xb2, '4'],
    [0x29, '5'],
    [0x6d, '6'],
    [0x19, '7'],
    [0x21, '8'],
    [0xc0, '9'],
    [0x00, ' '],
    [0x40, '.'],
    [0x12, ':'],
    [0xc9, 'E'],
  ]),
};

/** Signature a character produces, or undefined if the font lacks it */
export function signatureOf(font: OcrFont, char: string): number | undefined {
  for (const [signature, glyph] of font.glyphs) {
    if (glyph === char) return signature;
  }
  return undefined;
}

// ============================================================================
// Recognition
// ============================================================================

/** Probe signature of the glyph cell at (x, y) */
export function sampleSignature(canvas: Canvas, x: number, y: number, font: OcrFont): Result<number> {
  if (canvas.width === 0 || canvas.height === 0) return fail('malformedContainer', 'ocr');
  if (x < 0 || y < 0 || x + font.width > canvas.width || y + font.height > canvas.height) {
    return fail('imageSemantic', 'ocr');
  }

  let signature = 0;
  font.probes.forEach(([px, py], bit) => {
    if (canvas.data[(y + py) * canvas.width + x + px] === font.color) signature |= 1 << bit;
  });
  return ok(signature);
}

export function readChar(canvas: Canvas, x: number, y: number, font: OcrFont): Result<string> {
  const signature = sampleSignature(canvas, x, y, font);
  if (!signature.ok) return signature;
  const glyph = font.glyphs.get(signature.value);
  if (glyph === undefined) return fail('unrecognizedValue', 'ocr');
  return ok(glyph);
}

export interface ReadStringOptions {
  /** Gap between glyph cells in pixels */
  pitch?: number;
  /** Unrecognised glyphs that may be dropped before the read fails */
  maxUnknown?: number;
}

/**
 * Read `length` glyphs starting at (x, y). Unrecognised glyphs are left out of
 * the result, so the returned string may be shorter than `length`.
 */
export function readString(
  canvas: Canvas,
  x: number,
  y: number,
  length: number,
  font: OcrFont,
  options: ReadStringOptions = {}
): Result<string> {
  const { pitch = 0, maxUnknown = 0 } = options;

  if (canvas.width === 0 || canvas.height === 0) return fail('malformedContainer', 'ocr');
  if (
    length < 1 ||
    (font.width + pitch) * length + x > canvas.width + pitch ||
    y + font.height > canvas.height
  ) {
    return fail('outOfRange', 'ocr');
  }

  let text = '';
  let unknownLeft = maxUnknown;
  for (let i = 0; i < length; i++) {
    const read = readChar(canvas, x + i * (font.width + pitch), y, font);
    if (read.ok) {
      text += read.value;
      continue;
    }
    if (read.error.latest()?.reason !== 'unrecognizedValue' || unknownLeft === 0) return read;
    unknownLeft--;
  }
  return ok(text);
}
