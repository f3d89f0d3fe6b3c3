// ============================================================================
// @irshot/thermal – public API
// ============================================================================

export type {
  Rect,
  KnownModel,
  DeviceModel,
  PaletteId,
  PaletteEntry,
  PaletteTable,
  PaletteCache,
  LookupDirection,
  Locator,
  LocateOptions,
  Interpolation,
  Quantization,
  ThermalMask,
  ThermalImage,
  ThermalPoint,
  ThermalContext,
  ReconstructOptions,
  RecoveryOptions,
  RecoveryResult,
} from './types';
export { PixelClass } from './types';

import { createDebugLog, delegate, fail, ok } from '@irshot/raster';
import type { Bitmap, Result } from '@irshot/raster';
import type { RecoveryOptions, RecoveryResult } from './types';
import { CROSSHAIR_BORDER, CROSSHAIR_FILL } from './crosshair';
import { destroyLocator, locate, processLocator } from './locator';
import { readOsd } from './osd';
import { createThermal, destroyThermal, exportThermal, reconstruct, redrawCrosshair } from './thermal';

export {
  PALETTE_IDS,
  PALETTE_CACHE_SIZE,
  IGNORE_ERRORS,
  getPalette,
  validatePalette,
  createPaletteCache,
  resetPaletteCache,
  findByColor,
  findByValue,
  determinePalette,
} from './palettes';
export type { DeterminePaletteOptions } from './palettes';

export type {
  ModelGeometry,
  PixelKind,
  MatcherPhase,
  MatcherState,
  PainterPhase,
  PainterState,
  PainterStep,
} from './crosshair';
export {
  CROSSHAIR_BORDER,
  CROSSHAIR_FILL,
  CROSSHAIR_BORDER_RUNS,
  MODEL_GEOMETRY,
  KNOWN_MODELS,
  MATCHER_START,
  PAINTER_START,
  crosshairWidth,
  pixelKind,
  stepMatcher,
  identifyModel,
  stepPainter,
} from './crosshair';

export {
  SCREENSHOT_WIDTH,
  SCREENSHOT_HEIGHT,
  TEXT_REGION,
  IR_REGION,
  locate,
  createLocator,
  processLocator,
  classifyPixel,
  destroyLocator,
} from './locator';

export type { OsdReading } from './osd';
export { TEMPERATURE_FIELD, EMISSIVITY_FIELD, parseTemperature, parseEmissivity, readOsd } from './osd';

export {
  INTERPOLATIONS,
  QUANTIZATIONS,
  createThermal,
  createThermalImage,
  getThermalPoint,
  reconstruct,
  discardThermalImage,
  exportThermal,
  redrawCrosshair,
  destroyThermal,
} from './thermal';

// ============================================================================
// Main entry point
// ============================================================================

/**
 * Recover relative infrared data from a full screenshot.
 *
 * A screenshot without a recognisable crosshair is still decoded, with every
 * pixel treated as image data. An unreadable OSD leaves the temperature and
 * emissivity fields null.
 */
export function recoverScreenshot(screenshot: Bitmap, options: RecoveryOptions = {}): Result<RecoveryResult> {
  const {
    interpolation = 'squareLarge',
    quantization = 'medianLow',
    palette,
    redrawCrosshair: redraw = true,
    crosshairBorder = CROSSHAIR_BORDER,
    crosshairFill = CROSSHAIR_FILL,
    debug = false,
  } = options;
  const debugLog = createDebugLog('Recovery', debug);

  const located = locate(screenshot);
  if (!located.ok) return delegate('global', located.error);
  const locator = located.value;

  const processed = processLocator(locator, { debug });
  if (!processed.ok && locator.model !== 'unknown') {
    destroyLocator(locator);
    return delegate('global', processed.error);
  }
  debugLog('Model', { model: locator.model, crosshair: locator.crosshair });

  const created = createThermal(locator);
  destroyLocator(locator);
  if (!created.ok) return delegate('global', created.error);
  const context = created.value;

  const osd = readOsd(context);
  if (!osd.ok) console.warn('[Recovery] OSD readout unavailable:', osd.error.describe());

  const reconstructed = reconstruct(context, { interpolation, quantization, debug });
  if (!reconstructed.ok) {
    destroyThermal(context);
    return delegate('global', reconstructed.error);
  }

  const detected = context.palette;
  if (!detected) {
    destroyThermal(context);
    return fail('internalInconsistency', 'global');
  }
  const target = palette ?? detected;

  const rendered = exportThermal(context, target);
  if (!rendered.ok) {
    destroyThermal(context);
    return delegate('global', rendered.error);
  }

  if (redraw) {
    const painted = redrawCrosshair(crosshairBorder, crosshairFill, context, rendered.value);
    if (!painted.ok) {
      destroyThermal(context);
      return delegate('global', painted.error);
    }
  }

  const result: RecoveryResult = {
    model: context.model,
    palette: detected,
    spotTemperature: context.spotTemperature,
    emissivity: context.emissivity,
    spot: { ...context.spot },
    thermal: reconstructed.value,
    rendered: rendered.value,
  };
  destroyThermal(context);
  debugLog('Recovered', { model: result.model, palette: result.palette, exportedAs: target });
  return ok(result);
}
