/**
 * Synthetic canvases for tests.
 * Glyphs are drawn as their probe pixels only, which is all the OCR samples.
 */

import type { Canvas } from '../src/canvas';
import type { ErrorStack, Result } from '../src/errors';
import { signatureOf } from '../src/ocr';
import type { OcrFont } from '../src/ocr';

/** Value of a result expected to succeed */
export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`Unexpected failure: ${result.error.describe()}`);
  return result.value;
}

/** Error stack of a result expected to fail */
export function errorOf<T>(result: Result<T>): ErrorStack {
  if (result.ok) throw new Error('Expected a failure');
  return result.error;
}

export function canvasOf(width: number, height: number, pixels: number[] = []): Canvas {
  const data = new Uint16Array(width * height);
  data.set(pixels);
  return { data, width, height };
}

/** Light the probe pixels of one signature at (x, y) */
export function drawSignature(canvas: Canvas, x: number, y: number, font: OcrFont, signature: number): void {
  font.probes.forEach(([px, py], bit) => {
    if (signature & (1 << bit)) canvas.data[(y + py) * canvas.width + x + px] = font.color;
  });
}

export function drawText(
  canvas: Canvas,
  x: number,
  y: number,
  text: string,
  font: OcrFont,
  pitch = 0
): void {
  [...text].forEach((char, i) => {
    const signature = signatureOf(font, char);
    if (signature === undefined) throw new Error(`No ${font.name} glyph for '${char}'`);
    drawSignature(canvas, x + i * (font.width + pitch), y, font, signature);
  });
}
