import { LARGE_FONT, SMALL_FONT, delegate, fail, ok, readString } from '@irshot/raster';
import type { Result } from '@irshot/raster';
import type { ThermalContext } from './types';
import { TEXT_REGION } from './locator';

// ============================================================================
// OSD layout (relative to the text strip)
// ============================================================================

export const TEMPERATURE_FIELD = { x: 0, y: 0, pitch: 0, length: 6 } as const;
export const EMISSIVITY_FIELD = { x: 110, y: 3, pitch: 0, length: 6 } as const;

export interface OsdReading {
  /** Tenths of a degree Celsius */
  spotTemperature: number;
  /** Hundredths */
  emissivity: number;
}

// ============================================================================
// Parsing
// ============================================================================

const TEMPERATURE_PATTERN = /^\s*([+-]?\d+)\.(\d)(.)/;
const EMISSIVITY_PATTERN = /^\s*(\S{1,2})0\.(\d{1,2})/;

/**
 * Parse a reading such as ` 98.6F` or `-12.5C` into tenths of a degree
 * Celsius. Fahrenheit is converted in integers; the final division by nine
 * rounds half up above freezing and truncates towards zero below it.
 */
export function parseTemperature(text: string): Result<number> {
  const match = TEMPERATURE_PATTERN.exec(text);
  if (!match) return fail('imageSemantic', 'thermal');

  const [, integerText, fractionText, unit] = match;
  const integer = Number.parseInt(integerText, 10);
  const fraction = integerText.startsWith('-') ? -Number(fractionText) : Number(fractionText);

  switch (unit) {
    case 'C':
      return ok(integer * 10 + fraction);
    case 'F': {
      let scaled = ((integer - 32) * 10 + fraction) * 5;
      if (scaled % 9 >= 5) scaled += 8;
      return ok(Math.trunc(scaled / 9));
    }
    default:
      return fail('imageSemantic', 'thermal');
  }
}

/** Parse `E:0.95` into 95; the value must lie in 1..99 */
export function parseEmissivity(text: string): Result<number> {
  const match = EMISSIVITY_PATTERN.exec(text);
  if (!match) return fail('imageSemantic', 'thermal');

  const [, prefix, digits] = match;
  const value = Number.parseInt(digits, 10);
  if (prefix !== 'E:' || value < 1 || value > 99) return fail('imageSemantic', 'thermal');
  return ok(value);
}

// ============================================================================
// Reading
// ============================================================================

/**
 * Read spot temperature and emissivity off the text strip. Nothing is stored
 * on the context unless both values parse.
 */
export function readOsd(context: ThermalContext): Result<OsdReading> {
  const { textCanvas } = context;
  if (!textCanvas) return fail('nullInput', 'thermal');
  if (textCanvas.width !== TEXT_REGION.width || textCanvas.height !== TEXT_REGION.height) {
    return fail('outOfRange', 'thermal');
  }

  const temperatureText = readString(
    textCanvas,
    TEMPERATURE_FIELD.x,
    TEMPERATURE_FIELD.y,
    TEMPERATURE_FIELD.length,
    LARGE_FONT,
    { pitch: TEMPERATURE_FIELD.pitch, maxUnknown: 0 }
  );
  if (!temperatureText.ok) return delegate('thermal', temperatureText.error);

  const emissivityText = readString(
    textCanvas,
    EMISSIVITY_FIELD.x,
    EMISSIVITY_FIELD.y,
    EMISSIVITY_FIELD.length,
    SMALL_FONT,
    { pitch: EMISSIVITY_FIELD.pitch, maxUnknown: 0 }
  );
  if (!emissivityText.ok) return delegate('thermal', emissivityText.error);

  const spotTemperature = parseTemperature(temperatureText.value);
  if (!spotTemperature.ok) return spotTemperature;
  const emissivity = parseEmissivity(emissivityText.value);
  if (!emissivity.ok) return emissivity;

  context.spotTemperature = spotTemperature.value;
  context.emissivity = emissivity.value;
  return ok({ spotTemperature: spotTemperature.value, emissivity: emissivity.value });
}
