import { createDebugLog, delegate, editBitmap, fail, ok } from '@irshot/raster';
import type { Bitmap, Canvas, Result } from '@irshot/raster';
import type { LocateOptions, Locator, Rect } from './types';
import { PixelClass } from './types';
import {
  CROSSHAIR_BORDER,
  CROSSHAIR_BORDER_RUNS,
  CROSSHAIR_FILL,
  MATCHER_START,
  MIN_ROW_FILL,
  MODEL_GEOMETRY,
  crosshairWidth,
  identifyModel,
  pixelKind,
  stepMatcher,
  within,
} from './crosshair';

// ============================================================================
// Screenshot layout
// ============================================================================

export const SCREENSHOT_WIDTH = 174;
export const SCREENSHOT_HEIGHT = 220;

export const TEXT_REGION: Readonly<Rect> = { x: 2, y: 1, width: 170, height: 23 };
export const IR_REGION: Readonly<Rect> = { x: 12, y: 25, width: 150, height: 175 };

function emptyRect(): Rect {
  return { x: 0, y: 0, width: 0, height: 0 };
}

// ============================================================================
// Region split
// ============================================================================

/** Crop a screenshot into its OSD text strip and infrared region */
export function locate(screenshot: Bitmap): Result<Locator> {
  if (screenshot.width !== SCREENSHOT_WIDTH || screenshot.height !== SCREENSHOT_HEIGHT) {
    return fail('imageSemantic', 'locator');
  }

  const text = editBitmap(screenshot, TEXT_REGION.x, TEXT_REGION.y, TEXT_REGION.width, TEXT_REGION.height);
  if (!text.ok) return delegate('locator', text.error);
  const ir = editBitmap(screenshot, IR_REGION.x, IR_REGION.y, IR_REGION.width, IR_REGION.height);
  if (!ir.ok) return delegate('locator', ir.error);

  return ok(createLocator(text.value, ir.value));
}

/** Locator over already cropped regions, model still pending */
export function createLocator(textCanvas: Canvas, irCanvas: Canvas): Locator {
  return {
    model: 'pending',
    crosshair: emptyRect(),
    aperture: emptyRect(),
    textCanvas,
    irCanvas,
  };
}

// ============================================================================
// Model identification
// ============================================================================

/** Cheap per-row tally deciding whether the full matcher is worth running */
function isCandidateRow(ir: Canvas, y: number): boolean {
  let borders = 0;
  let fill = 0;
  for (let x = 0; x < ir.width; x++) {
    const color = ir.data[y * ir.width + x];
    if (color === CROSSHAIR_BORDER) borders++;
    else if (color === CROSSHAIR_FILL) fill++;
    if (borders >= CROSSHAIR_BORDER_RUNS && fill >= MIN_ROW_FILL) return true;
  }
  return false;
}

/**
 * Scan the infrared region for the crosshair and fill in model and geometry.
 * When no row carries a known crosshair the model becomes `unknown` and the
 * call fails with `imageSemantic`; the locator stays usable in that case.
 */
export function processLocator(locator: Locator, options: LocateOptions = {}): Result<Locator> {
  const debugLog = createDebugLog('Locator', options.debug);
  const { textCanvas, irCanvas } = locator;
  if (!textCanvas || !irCanvas) return fail('nullInput', 'locator');
  if (
    textCanvas.width !== TEXT_REGION.width ||
    textCanvas.height !== TEXT_REGION.height ||
    irCanvas.width !== IR_REGION.width ||
    irCanvas.height !== IR_REGION.height
  ) {
    return fail('outOfRange', 'locator');
  }

  let candidates = 0;
  for (let y = 0; y < irCanvas.height; y++) {
    if (!isCandidateRow(irCanvas, y)) continue;
    candidates++;

    let state = { ...MATCHER_START };
    for (let x = 0; x < irCanvas.width; x++) {
      state = stepMatcher(state, pixelKind(irCanvas.data[y * irCanvas.width + x]));
      const model = identifyModel(state);
      if (!model) continue;

      const geometry = MODEL_GEOMETRY[model];
      const width = crosshairWidth(geometry);
      locator.model = model;
      locator.crosshair = { x: x + 1 - width, y: y - geometry.targetRow, width, height: geometry.height };
      locator.aperture = {
        x: locator.crosshair.x + geometry.centerOffsetX,
        y: locator.crosshair.y + geometry.centerOffsetY,
        width: geometry.centerWidth,
        height: geometry.centerHeight,
      };
      debugLog('Crosshair found', { model, row: y, crosshair: locator.crosshair, candidates });
      return ok(locator);
    }
  }

  debugLog('No crosshair found', { candidates });
  locator.model = 'unknown';
  locator.crosshair = emptyRect();
  locator.aperture = emptyRect();
  return fail('imageSemantic', 'locator');
}

// ============================================================================
// Per-pixel classification
// ============================================================================

export function classifyPixel(locator: Locator, x: number, y: number): PixelClass {
  const { irCanvas, model, crosshair } = locator;
  if (!irCanvas || irCanvas.width < 1 || irCanvas.height < 1) return PixelClass.Fail;
  if (x < 0 || y < 0 || x >= irCanvas.width || y >= irCanvas.height) return PixelClass.Bounds;

  switch (model) {
    case 'pending':
      return PixelClass.Fail;
    case 'unknown':
      return PixelClass.Image;
    default: {
      const geometry = MODEL_GEOMETRY[model];
      if (crosshair.width !== crosshairWidth(geometry) || crosshair.height !== geometry.height) {
        return PixelClass.Fail;
      }
      if (!within(x, y, crosshair)) return PixelClass.Image;
      const dx = x - crosshair.x;
      const dy = y - crosshair.y;
      return geometry.strokes.some((rect) => within(dx, dy, rect)) ? PixelClass.Crosshair : PixelClass.Image;
    }
  }
}

/** Release both regions */
export function destroyLocator(locator: Locator): void {
  locator.textCanvas = null;
  locator.irCanvas = null;
  locator.model = 'pending';
  locator.crosshair = emptyRect();
  locator.aperture = emptyRect();
}
