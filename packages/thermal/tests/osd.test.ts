import { describe, expect, test } from 'vitest';
import { LARGE_FONT } from '@irshot/raster';
import { parseEmissivity, parseTemperature, readOsd } from '../src/osd';
import { canvasOf, contextOf, createScreenshot, drawSignature, errorOf, unwrap } from './fixtures';

function textContext(text = canvasOf(170, 23)) {
  return contextOf(canvasOf(1, 1, [35]), undefined, text);
}

describe('OSD parsing', () => {
  test('Celsius readings in tenths', () => {
    expect(unwrap(parseTemperature('100.0C'))).toBe(1000);
    expect(unwrap(parseTemperature('-12.5C'))).toBe(-125);
    expect(unwrap(parseTemperature(' -0.5C'))).toBe(-5);
  });

  test('Fahrenheit readings are converted', () => {
    expect(unwrap(parseTemperature(' 98.6F'))).toBe(370);
    expect(unwrap(parseTemperature(' 32.0F'))).toBe(0);
    expect(unwrap(parseTemperature(' 33.0F'))).toBe(6);
  });

  test('sub-freezing Fahrenheit truncates towards zero', () => {
    // -1600 / 9 = -177.8; the half-up step only applies to positive remainders
    expect(unwrap(parseTemperature('  0.0F'))).toBe(-177);
    expect(unwrap(parseTemperature(' 14.0F'))).toBe(-100);
  });

  test('unreadable temperatures', () => {
    expect(errorOf(parseTemperature('12.3K')).latest()).toEqual({ reason: 'imageSemantic', source: 'thermal' });
    expect(errorOf(parseTemperature('  LO  ')).latest()?.reason).toBe('imageSemantic');
  });

  test('emissivity', () => {
    expect(unwrap(parseEmissivity('E:0.95'))).toBe(95);
    expect(errorOf(parseEmissivity('E:0.00')).latest()?.reason).toBe('imageSemantic');
    expect(errorOf(parseEmissivity('X:0.95')).latest()?.reason).toBe('imageSemantic');
    expect(errorOf(parseEmissivity('E:1.00')).latest()?.reason).toBe('imageSemantic');
  });
});

describe('readOsd', () => {
  test('reads both fields off the text strip', () => {
    const { text } = createScreenshot({ temperature: ' 98.6F', emissivity: 'E:0.95' });
    const context = textContext(text);
    expect(unwrap(readOsd(context))).toEqual({ spotTemperature: 370, emissivity: 95 });
    expect(context.spotTemperature).toBe(370);
    expect(context.emissivity).toBe(95);
  });

  test('stores nothing unless both fields parse', () => {
    const { text } = createScreenshot({ temperature: ' 98.6F' });
    const context = textContext(text);
    expect(errorOf(readOsd(context)).latest()).toEqual({ reason: 'imageSemantic', source: 'thermal' });
    expect(context.spotTemperature).toBeNull();
    expect(context.emissivity).toBeNull();
  });

  test('unknown glyphs are reported through the thermal component', () => {
    const text = canvasOf(170, 23);
    drawSignature(text, 0, 0, LARGE_FONT, 0xff);
    const error = errorOf(readOsd(textContext(text)));
    expect(error.latest()).toEqual({ reason: 'delegatedFailure', source: 'thermal' });
    expect(error.first()).toEqual({ reason: 'unrecognizedValue', source: 'ocr' });
  });

  test('text strip checks', () => {
    expect(errorOf(readOsd(contextOf(canvasOf(1, 1, [35])))).latest()?.reason).toBe('nullInput');
    expect(errorOf(readOsd(textContext(canvasOf(170, 22)))).latest()?.reason).toBe('outOfRange');
  });
});
