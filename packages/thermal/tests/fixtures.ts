/**
 * Synthetic screenshots for tests.
 *
 * Infrared regions are a diagonal rainbow gradient, which never uses the
 * crosshair colors. Crosshairs are drawn from the model's stroke rectangles:
 * a stroke pixel whose four neighbours are all stroke pixels is fill, every
 * other stroke pixel is border.
 */

import { LARGE_FONT, SMALL_FONT, bitmapFromCanvas, mergeCanvas, signatureOf } from '@irshot/raster';
import type { Bitmap, Canvas, ErrorStack, OcrFont, Result } from '@irshot/raster';
import type { KnownModel, PaletteId, ThermalContext } from '../src/types';
import { PixelClass } from '../src/types';
import { getPalette } from '../src/palettes';
import { CROSSHAIR_BORDER, CROSSHAIR_FILL, MODEL_GEOMETRY, crosshairWidth, within } from '../src/crosshair';
import { IR_REGION, SCREENSHOT_HEIGHT, SCREENSHOT_WIDTH, TEXT_REGION } from '../src/locator';
import { EMISSIVITY_FIELD, TEMPERATURE_FIELD } from '../src/osd';

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`Unexpected failure: ${result.error.describe()}`);
  return result.value;
}

export function errorOf<T>(result: Result<T>): ErrorStack {
  if (result.ok) throw new Error('Expected a failure');
  return result.error;
}

export function canvasOf(width: number, height: number, pixels: readonly number[] = []): Canvas {
  const data = new Uint16Array(width * height);
  data.set(pixels);
  return { data, width, height };
}

// ============================================================================
// OSD glyphs
// ============================================================================

/** Light the probe pixels of one OCR signature at (x, y) */
export function drawSignature(canvas: Canvas, x: number, y: number, font: OcrFont, signature: number): void {
  font.probes.forEach(([px, py], bit) => {
    if (signature & (1 << bit)) canvas.data[(y + py) * canvas.width + x + px] = font.color;
  });
}

function drawText(canvas: Canvas, x: number, y: number, text: string, font: OcrFont): void {
  [...text].forEach((char, i) => {
    const signature = signatureOf(font, char);
    if (signature === undefined) throw new Error(`No ${font.name} glyph for '${char}'`);
    drawSignature(canvas, x + i * font.width, y, font, signature);
  });
}

// ============================================================================
// Infrared regions
// ============================================================================

export function paletteColor(id: PaletteId, index: number): number {
  const entry = getPalette(id).entries[index];
  if (!entry) throw new Error(`No entry ${index} in ${id}`);
  return entry.color;
}

export function rainbowColorAt(x: number, y: number): number {
  return paletteColor('rainbow', (x + y) % 256);
}

export function rainbowBackground(width: number, height: number): Canvas {
  const canvas = canvasOf(width, height);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) canvas.data[y * width + x] = rainbowColorAt(x, y);
  }
  return canvas;
}

/** Whether (dx, dy), relative to the crosshair origin, is covered by a stroke */
export function isStroke(model: KnownModel, dx: number, dy: number): boolean {
  return MODEL_GEOMETRY[model].strokes.some((rect) => within(dx, dy, rect));
}

export function drawCrosshair(canvas: Canvas, model: KnownModel, originX: number, originY: number): void {
  const geometry = MODEL_GEOMETRY[model];
  for (let dy = 0; dy < geometry.height; dy++) {
    for (let dx = 0; dx < crosshairWidth(geometry); dx++) {
      if (!isStroke(model, dx, dy)) continue;
      const x = originX + dx;
      const y = originY + dy;
      if (x < 0 || y < 0 || x >= canvas.width || y >= canvas.height) continue;
      const inner =
        isStroke(model, dx - 1, dy) &&
        isStroke(model, dx + 1, dy) &&
        isStroke(model, dx, dy - 1) &&
        isStroke(model, dx, dy + 1);
      canvas.data[y * canvas.width + x] = inner ? CROSSHAIR_FILL : CROSSHAIR_BORDER;
    }
  }
}

export interface ScreenshotOptions {
  model?: KnownModel;
  /** Crosshair origin inside the infrared region */
  origin?: readonly [number, number];
  temperature?: string;
  emissivity?: string;
}

export interface Screenshot {
  bitmap: Bitmap;
  /** Infrared region as drawn */
  ir: Canvas;
  /** OSD strip as drawn */
  text: Canvas;
}

export function createScreenshot(options: ScreenshotOptions = {}): Screenshot {
  const { model, origin = [40, 60], temperature, emissivity } = options;

  const ir = rainbowBackground(IR_REGION.width, IR_REGION.height);
  if (model) drawCrosshair(ir, model, origin[0], origin[1]);

  const text = canvasOf(TEXT_REGION.width, TEXT_REGION.height);
  if (temperature) drawText(text, TEMPERATURE_FIELD.x, TEMPERATURE_FIELD.y, temperature, LARGE_FONT);
  if (emissivity) drawText(text, EMISSIVITY_FIELD.x, EMISSIVITY_FIELD.y, emissivity, SMALL_FONT);

  const screen = canvasOf(SCREENSHOT_WIDTH, SCREENSHOT_HEIGHT);
  unwrap(mergeCanvas(text, 0, 0, TEXT_REGION.x, TEXT_REGION.y, text.width, text.height, screen));
  unwrap(mergeCanvas(ir, 0, 0, IR_REGION.x, IR_REGION.y, ir.width, ir.height, screen));

  return { bitmap: unwrap(bitmapFromCanvas(screen)), ir, text };
}

/** Context over a small infrared canvas, every pixel image data unless `mask` says otherwise */
export function contextOf(ir: Canvas, mask?: readonly number[], text: Canvas | null = null): ThermalContext {
  const pixels = new Uint8Array(ir.width * ir.height).fill(PixelClass.Image);
  if (mask) pixels.set(mask);
  return {
    model: 'unknown',
    spot: { x: 0, y: 0, width: 0, height: 0 },
    irCanvas: ir,
    textCanvas: text,
    mask: { width: ir.width, height: ir.height, pixels },
    image: null,
    palette: null,
    spotTemperature: null,
    emissivity: null,
  };
}
