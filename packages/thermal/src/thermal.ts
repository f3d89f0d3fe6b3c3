import { createCanvas, createDebugLog, delegate, fail, ok } from '@irshot/raster';
import type { Canvas, Result } from '@irshot/raster';
import type {
  Interpolation,
  Locator,
  PaletteEntry,
  PaletteId,
  Quantization,
  ReconstructOptions,
  ThermalContext,
  ThermalImage,
  ThermalMask,
  ThermalPoint,
} from './types';
import { PixelClass } from './types';
import { classifyPixel } from './locator';
import {
  IGNORE_ERRORS,
  createPaletteCache,
  determinePalette,
  findByColor,
  findByValue,
  getPalette,
} from './palettes';
import { PAINTER_START, stepPainter } from './crosshair';

export const INTERPOLATIONS: readonly Interpolation[] = [
  'zero',
  'min',
  'med',
  'max',
  'squareSmall',
  'squareLarge',
  'squareWeight',
];

export const QUANTIZATIONS: readonly Quantization[] = ['exact', 'floor', 'ceiling', 'medianLow', 'medianHigh'];

// ============================================================================
// Context lifecycle
// ============================================================================

/**
 * Build a thermal context from a processed locator. Both canvases move into
 * the context; the locator's canvas fields are null afterwards.
 */
export function createThermal(locator: Locator): Result<ThermalContext> {
  const { textCanvas, irCanvas, model } = locator;
  if (!textCanvas || !irCanvas) return fail('nullInput', 'thermal');
  if (irCanvas.width < 1 || irCanvas.height < 1 || textCanvas.width < 1 || textCanvas.height < 1) {
    return fail('outOfRange', 'thermal');
  }
  if (model === 'pending') return fail('outOfRange', 'thermal');
  if (
    model !== 'unknown' &&
    (locator.crosshair.width < 1 ||
      locator.crosshair.height < 1 ||
      locator.aperture.width < 1 ||
      locator.aperture.height < 1)
  ) {
    return fail('outOfRange', 'thermal');
  }

  const mask: ThermalMask = {
    width: irCanvas.width,
    height: irCanvas.height,
    pixels: new Uint8Array(irCanvas.width * irCanvas.height),
  };
  for (let y = 0; y < mask.height; y++) {
    for (let x = 0; x < mask.width; x++) {
      mask.pixels[y * mask.width + x] = classifyPixel(locator, x, y);
    }
  }

  const context: ThermalContext = {
    model,
    spot: { ...locator.aperture },
    irCanvas,
    textCanvas,
    mask,
    image: null,
    palette: null,
    spotTemperature: null,
    emissivity: null,
  };
  locator.irCanvas = null;
  locator.textCanvas = null;
  return ok(context);
}

/** Drop the reconstructed image so reconstruct may run again */
export function discardThermalImage(context: ThermalContext): void {
  context.image = null;
  context.palette = null;
}

export function destroyThermal(context: ThermalContext): void {
  context.image = null;
  context.irCanvas = null;
  context.textCanvas = null;
  context.mask = null;
  context.palette = null;
}

export function createThermalImage(width: number, height: number, quantization: Quantization): ThermalImage {
  return {
    width,
    height,
    quantization,
    values: new Uint8Array(width * height),
    uncertainty: new Uint8Array(width * height),
  };
}

export function getThermalPoint(image: ThermalImage, x: number, y: number): Result<ThermalPoint> {
  if (x < 0 || y < 0 || x >= image.width || y >= image.height) return fail('outOfRange', 'thermal');
  const i = y * image.width + x;
  return ok({ value: image.values[i], uncertainty: image.uncertainty[i] });
}

// ============================================================================
// Reconstruction
// ============================================================================

function quantize(entry: PaletteEntry, quantization: Quantization): number {
  switch (quantization) {
    case 'exact':
    case 'floor':
      return entry.base;
    case 'ceiling':
      return entry.base + entry.width - 1;
    case 'medianLow':
      return entry.base + Math.floor((entry.width - 1) / 2);
    case 'medianHigh':
      return entry.base + Math.floor(entry.width / 2);
  }
}

interface Neighbourhood {
  sum: number;
  count: number;
}

/** Add every finalised image pixel within `radius` of (x, y), `weight` times */
function addSquare(
  acc: Neighbourhood,
  image: ThermalImage,
  mask: ThermalMask,
  x: number,
  y: number,
  radius: number,
  weight = 1
): void {
  for (let dy = -radius; dy <= radius; dy++) {
    const ny = y + dy;
    if (ny < 0 || ny >= mask.height) continue;
    for (let dx = -radius; dx <= radius; dx++) {
      const nx = x + dx;
      if (nx < 0 || nx >= mask.width) continue;
      const i = ny * mask.width + nx;
      if (mask.pixels[i] !== PixelClass.Image) continue;
      acc.sum += image.values[i] * weight;
      acc.count += weight;
    }
  }
}

interface Statistics {
  min: number;
  max: number;
  med: number;
}

function interpolate(
  interpolation: Interpolation,
  stats: Statistics,
  image: ThermalImage,
  mask: ThermalMask,
  x: number,
  y: number
): Result<number> {
  const acc: Neighbourhood = { sum: 0, count: 0 };

  // The square policies stack their rings, so inner pixels weigh more
  switch (interpolation) {
    case 'zero':
      return ok(0);
    case 'min':
      return ok(stats.min);
    case 'max':
      return ok(stats.max);
    case 'med':
      return ok(stats.med);
    case 'squareLarge':
      addSquare(acc, image, mask, x, y, 6);
      addSquare(acc, image, mask, x, y, 1);
      addSquare(acc, image, mask, x, y, 2);
      break;
    case 'squareWeight':
      addSquare(acc, image, mask, x, y, 1, 4);
      addSquare(acc, image, mask, x, y, 2);
      break;
    case 'squareSmall':
      addSquare(acc, image, mask, x, y, 2);
      break;
  }

  if (acc.count < 1) return fail('imageSemantic', 'thermal');
  return ok(Math.floor(acc.sum / acc.count));
}

/**
 * Convert the infrared canvas into relative intensities.
 *
 * Pass one decodes every image pixel through the detected palette; pixels the
 * palette does not know are marked invalid. Pass two, which only runs when
 * something was left out, fills crosshair and invalid pixels according to
 * `interpolation`, starting at the first row that needs it.
 */
export function reconstruct(context: ThermalContext, options: ReconstructOptions = {}): Result<ThermalImage> {
  const { interpolation = 'squareLarge', quantization = 'medianLow', debug = false } = options;
  const debugLog = createDebugLog('Thermal', debug);

  const { irCanvas } = context;
  if (!irCanvas || !context.mask) return fail('nullInput', 'thermal');
  if (!INTERPOLATIONS.includes(interpolation) || !QUANTIZATIONS.includes(quantization)) {
    return fail('outOfRange', 'thermal');
  }
  if (
    irCanvas.width < 1 ||
    irCanvas.height < 1 ||
    context.mask.width !== irCanvas.width ||
    context.mask.height !== irCanvas.height
  ) {
    return fail('outOfRange', 'thermal');
  }
  if (context.image) return fail('doubleInitialization', 'thermal');

  // Committed to the context only on success
  const mask: ThermalMask = { ...context.mask, pixels: context.mask.pixels.slice() };

  const palette = determinePalette(irCanvas, IGNORE_ERRORS, { debug });
  if (!palette.ok) return delegate('thermal', palette.error);
  const table = getPalette(palette.value);
  const cache = createPaletteCache();

  const { width, height } = irCanvas;
  const image = createThermalImage(width, height, quantization);

  let skipped = 0;
  let startY = -1;
  let sum = 0;
  let count = 0;
  let min = 0xff;
  let max = 0;

  // Pass one
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      switch (mask.pixels[i]) {
        case PixelClass.Image: {
          const found = findByColor(irCanvas.data[i], table, cache);
          if (!found.ok) {
            if (found.error.latest()?.reason !== 'imageSemantic') return delegate('thermal', found.error);
            mask.pixels[i] = PixelClass.Invalid;
            if (startY < 0) startY = y;
            skipped++;
            break;
          }

          const entry = found.value;
          if (entry.width < 1) return fail('imageSemantic', 'thermal');
          if (quantization === 'exact' && entry.width !== 1) return fail('imageSemantic', 'thermal');

          sum += entry.base;
          count++;
          if (entry.base > max) max = entry.base;
          if (entry.base < min) min = entry.base;

          image.values[i] = quantize(entry, quantization);
          image.uncertainty[i] = entry.width;
          break;
        }

        case PixelClass.Crosshair:
          if (startY < 0) startY = y;
          if (interpolation === 'zero') {
            image.values[i] = 0;
            image.uncertainty[i] = 1;
          } else {
            skipped++;
          }
          break;

        default:
          return fail('outOfRange', 'thermal');
      }
    }
  }

  if (count > 0 && min > max) return fail('internalInconsistency', 'thermal');
  debugLog('First pass done', { palette: palette.value, skipped, startY, count, min, max });

  if (skipped === 0) return commit(context, mask, image, palette.value);

  if (startY < 0) return fail('internalInconsistency', 'thermal');
  if (count < 1 && interpolation !== 'zero') return fail('imageSemantic', 'thermal');

  const stats: Statistics = { min, max, med: count > 0 ? Math.floor(sum / count) : 0 };

  // Pass two
  for (let y = startY; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const pixel = mask.pixels[i];
      if (pixel === PixelClass.Image) continue;
      if (pixel !== PixelClass.Crosshair && pixel !== PixelClass.Invalid) {
        return fail('internalInconsistency', 'thermal');
      }
      // Zero-filled in pass one
      if (pixel === PixelClass.Crosshair && interpolation === 'zero') continue;

      skipped--;
      const value = interpolate(interpolation, stats, image, mask, x, y);
      if (!value.ok) return value;
      image.values[i] = value.value;
      image.uncertainty[i] = 1;
      if (pixel === PixelClass.Invalid) mask.pixels[i] = PixelClass.Image;
    }
  }

  if (skipped !== 0) return fail('internalInconsistency', 'thermal');
  debugLog('Second pass done', { interpolation, med: stats.med });
  return commit(context, mask, image, palette.value);
}

function commit(
  context: ThermalContext,
  mask: ThermalMask,
  image: ThermalImage,
  palette: PaletteId
): Result<ThermalImage> {
  context.mask = mask;
  context.image = image;
  context.palette = palette;
  return ok(image);
}

// ============================================================================
// Export
// ============================================================================

/** Render the thermal image through any palette */
export function exportThermal(context: ThermalContext, paletteId: PaletteId): Result<Canvas> {
  const { image } = context;
  if (!image) return fail('nullInput', 'thermal');

  const created = createCanvas(image.width, image.height);
  if (!created.ok) return delegate('thermal', created.error);
  const canvas = created.value;

  const table = getPalette(paletteId);
  const cache = createPaletteCache();
  for (let i = 0; i < image.values.length; i++) {
    const found = findByValue(image.values[i], table, cache);
    if (!found.ok) return delegate('thermal', found.error);
    if (found.value.width < 1) return fail('imageSemantic', 'thermal');
    canvas.data[i] = found.value.color;
  }
  return ok(canvas);
}

// ============================================================================
// Crosshair redraw
// ============================================================================

/**
 * Paint the crosshair from the mask onto `canvas`: rows first, then columns.
 * The row pass paints border on the first pixel of a run and fill on the
 * rest; the column pass only paints run starts. Closing a fill run longer than
 * one pixel turns its last pixel into border.
 */
export function redrawCrosshair(
  border: number,
  fill: number,
  context: ThermalContext,
  canvas: Canvas
): Result<Canvas> {
  const { mask } = context;
  if (!mask) return fail('nullInput', 'thermal');
  if (mask.width !== canvas.width || mask.height !== canvas.height || canvas.width < 1 || canvas.height < 1) {
    return fail('outOfRange', 'thermal');
  }
  for (const pixel of mask.pixels) {
    if (pixel !== PixelClass.Image && pixel !== PixelClass.Crosshair) {
      return fail('internalInconsistency', 'thermal');
    }
  }

  const { width, height } = mask;

  for (let y = 0; y < height; y++) {
    let state = { ...PAINTER_START };
    for (let x = 0; x < width; x++) {
      const i = y * width + x;
      const step = stepPainter(state, mask.pixels[i] === PixelClass.Crosshair);
      state = step.state;
      if (step.closeRun) canvas.data[i - 1] = border;
      if (step.paint === 'border') canvas.data[i] = border;
      else if (step.paint === 'fill') canvas.data[i] = fill;
    }
  }

  for (let x = 0; x < width; x++) {
    let state = { ...PAINTER_START };
    for (let y = 0; y < height; y++) {
      const i = y * width + x;
      const step = stepPainter(state, mask.pixels[i] === PixelClass.Crosshair);
      state = step.state;
      if (step.closeRun) canvas.data[i - width] = border;
      if (step.paint === 'border') canvas.data[i] = border;
    }
  }

  return ok(canvas);
}
